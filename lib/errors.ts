import { SimpleError } from './util/flow';
import type { UnmetDependency } from './dependency-check';

/**
 * Malformed project configuration, or a combination of options that can't be honored
 */
export class ConfigurationError extends SimpleError {
}

export class UnmetDependenciesError extends SimpleError {
  constructor(public readonly unmet: UnmetDependency[]) {
    super(`Missing dependencies: ${unmet.map(u => u.requirement).join(', ')}`);
  }
}

/**
 * The backend was reached but the hook raised
 */
export class BackendRaisedError extends SimpleError {
  constructor(public readonly hook: string, message: string, public readonly traceback?: string) {
    super(`Backend hook '${hook}' failed: ${message}`);
  }
}

/**
 * The backend could not be loaded, or its process died before reporting
 */
export class BackendUnavailableError extends SimpleError {
  constructor(public readonly hook: string, message: string, public readonly output: string) {
    super(`Backend unavailable while calling '${hook}': ${message}`);
  }
}

export class InstallerError extends SimpleError {
  constructor(
    message: string,
    public readonly argv: string[],
    public readonly exitCode: number | undefined,
    public readonly output: string) {
    super(message);
  }
}

export class ProvisioningError extends SimpleError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
  }
}

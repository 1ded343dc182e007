/**
 * The build backend hooks a frontend may call
 */
export const HOOKS = [
  'get_requires_for_build_sdist',
  'get_requires_for_build_wheel',
  'build_sdist',
  'build_wheel',
  'prepare_metadata_for_build_wheel',
] as const;

export type HookName = typeof HOOKS[number];

export type Distribution = 'sdist' | 'wheel';

/**
 * Free-form settings passed through to the backend
 */
export type ConfigSettings = Record<string, string | string[]>;

/**
 * JSON values, as hooks take and return them
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * How a hook call ended
 *
 * The backend not defining an optional hook is an outcome like any other;
 * it's up to the caller to decide what that means.
 */
export type HookOutcome =
  | { readonly type: 'success'; readonly value: JsonValue }
  | { readonly type: 'not-implemented' }
  | { readonly type: 'backend-raised'; readonly message: string; readonly traceback: string }
  | { readonly type: 'backend-unavailable'; readonly message: string; readonly output: string };

export interface HookInvocation {
  readonly hook: HookName;
  readonly kwargs: Record<string, JsonValue>;

  /**
   * Working directory of the hook
   */
  readonly sourceDir: string;
  readonly pythonExecutable: string;
  readonly extraEnvironment: Record<string, string>;

  /**
   * Backend object reference, 'module:object'
   */
  readonly backend: string;
  readonly backendPath?: string[];
}

/**
 * Gets a hook call across to a backend and the outcome back
 */
export interface HookTransport {
  call(invocation: HookInvocation): Promise<HookOutcome>;
}

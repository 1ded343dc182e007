import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { findFileUp, readFileIfExists, withTemporaryDirectory } from '../util/files';
import { errorMessage, SimpleError } from '../util/flow';
import { ProcessError, ProcessRunner } from '../util/process';
import { HookInvocation, HookOutcome, HookTransport, JsonValue } from './hooks';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() => z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(jsonValueSchema),
  z.record(jsonValueSchema),
]));

const hookOutputSchema = z.object({
  return_val: jsonValueSchema.optional(),
  unsupported: z.boolean().optional(),
  backend_error: z.string().optional(),
  backend_invalid: z.boolean().optional(),
  traceback: z.string().optional(),
});

/**
 * Calls hooks by running the hook runner script with the bound interpreter
 *
 * Arguments and results go through 'input.json' and 'output.json' in a fresh
 * control directory, so the backend may print whatever it likes.
 */
export class SubprocessHookTransport implements HookTransport {
  /**
   * @param hookRunner path to hook_runner.py, found next to the package if not given
   */
  constructor(private readonly runner: ProcessRunner, private readonly hookRunner?: string) {
  }

  public async call(invocation: HookInvocation): Promise<HookOutcome> {
    const script = this.hookRunner ?? await locateHookRunner();

    return withTemporaryDirectory('pybuild-hook-', async (controlDir) => {
      await fs.writeFile(path.join(controlDir, 'input.json'), JSON.stringify({ kwargs: invocation.kwargs }), { encoding: 'utf-8' });

      const extraEnv: Record<string, string> = {
        ...invocation.extraEnvironment,
        _PYBUILD_BACKEND: invocation.backend,
      };
      if (invocation.backendPath !== undefined) {
        extraEnv._PYBUILD_BACKEND_PATH = invocation.backendPath
          .map(p => path.resolve(invocation.sourceDir, p))
          .join(path.delimiter);
      }

      let output: string;
      try {
        output = await this.runner.run([invocation.pythonExecutable, script, invocation.hook, controlDir], {
          cwd: invocation.sourceDir,
          extraEnv,
        });
      } catch (e) {
        if (e instanceof ProcessError) {
          return { type: 'backend-unavailable', message: e.message, output: e.output };
        }
        throw e;
      }

      const text = await readFileIfExists(path.join(controlDir, 'output.json'));
      if (text === undefined) {
        return { type: 'backend-unavailable', message: 'Hook runner exited without reporting a result', output };
      }
      return interpretHookOutput(text, output);
    });
  }
}

/**
 * Turn what the hook runner wrote into an outcome
 */
export function interpretHookOutput(text: string, processOutput: string): HookOutcome {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    return { type: 'backend-unavailable', message: `Hook runner wrote unreadable output: ${errorMessage(e)}`, output: processOutput };
  }

  const parsed = hookOutputSchema.safeParse(raw);
  if (!parsed.success) {
    return { type: 'backend-unavailable', message: `Hook runner wrote unexpected output: ${parsed.error.message}`, output: processOutput };
  }

  const result = parsed.data;
  if (result.backend_invalid) {
    return {
      type: 'backend-unavailable',
      message: result.backend_error ?? 'Backend could not be loaded',
      output: [processOutput, result.traceback ?? ''].filter(x => x !== '').join('\n'),
    };
  }
  if (result.backend_error !== undefined) {
    return { type: 'backend-raised', message: result.backend_error, traceback: result.traceback ?? '' };
  }
  if (result.unsupported) {
    return { type: 'not-implemented' };
  }
  if (result.return_val !== undefined) {
    return { type: 'success', value: result.return_val };
  }
  return { type: 'backend-unavailable', message: 'Hook runner reported neither a result nor an error', output: processOutput };
}

async function locateHookRunner(): Promise<string> {
  const script = await findFileUp(path.join('resources', 'hook_runner.py'), __dirname);
  if (script === undefined) {
    throw new SimpleError(`Could not find resources/hook_runner.py above ${__dirname}`);
  }
  return script;
}

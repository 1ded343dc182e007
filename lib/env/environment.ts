/**
 * Where backend hooks and installers run
 *
 * Anything with an interpreter and a set of environment variables to run it
 * with will do; not passing an environment means the host interpreter.
 */
export interface IsolatedEnvironment {
  readonly pythonExecutable: string;

  /**
   * Variables to add to the process environment when running in this environment
   */
  extraEnvironment(): Record<string, string>;
}

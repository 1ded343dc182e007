export * from './backend/hooks';
export { BackendGateway, BackendBinding, extractDistInfo } from './backend/gateway';
export { SubprocessHookTransport } from './backend/subprocess-transport';
export * from './config/project-config';
export * from './dependency-check';
export * from './env/environment';
export { DefaultIsolatedEnv, DefaultIsolatedEnvOptions } from './env/isolated-env';
export { EnvImpl, ENV_IMPLS, EnvStrategy, StrategyResolver, hostStrategyResolver } from './env/strategies';
export { Installer, PipInstaller, UvInstaller } from './env/installer';
export * from './errors';
export * from './metadata';
export * from './pipeline';
export * from './project-builder';
export { Interpreter, PythonInterpreter, InterpreterError } from './python/interpreter';
export { Requirement, InvalidRequirement } from './requirements/requirement';
export { Marker, MarkerEnvironment, InvalidMarker } from './requirements/markers';
export { Version, Specifier, SpecifierSet, InvalidVersion } from './requirements/version';
export { SimpleError } from './util/flow';
export { Logger, LogOrigin, LogSink } from './util/log';
export { ProcessError, ProcessRunner, SubprocessRunner } from './util/process';

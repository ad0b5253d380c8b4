export { runCli, buildProgram, CLI_VERSION } from './cli.js';
export type { CliDeps } from './cli.js';
export type { CliContext, OutputOptions } from './context.js';

/**
 * Newsletter Agents
 *
 * Library entry point. The CLI lives in `cli.ts`, the process entry in
 * `main.ts`.
 */

export * from './ai/newsletter';
export * from './ai/tools';
export * from './ai/provider';
export * from './config';
export * from './utils/logger';
export { runCli, parseCliArgs, type CliDeps, type CliOptions } from './cli';

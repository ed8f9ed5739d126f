/**
 * Newsletter CLI
 *
 * Usage: newsletter-agents [--config <path>] [--output-dir <dir>] [--verbose]
 *
 * Loads the reader configuration, runs the pipeline and writes the report
 * to a timestamped file. Returns exit code 0 on success and 1 on any
 * configuration or pipeline failure.
 */

import { parseArgs } from 'node:util';

import { generateText } from 'ai';

import { DEFAULT_CONFIG_PATH, loadConfig } from './config/loader';
import { loadRuntimeEnv } from './config/env';
import type { NewsletterConfig } from './config/schema';
import {
  ConfigurationError,
  errorMessage,
  generateNewsletter,
  isNewsletterError,
  saveReport,
  systemClock,
  REPORT_CONFIG,
  type Clock,
  type GenerateTextFn,
} from './ai/newsletter';
import { createModelResolver, type ModelResolver } from './ai/provider';
import { createSearchTools, type AgentTool } from './ai/tools';
import { configureLogger } from './utils/logger';

export const USAGE = `Usage: newsletter-agents [options]

Generate a personalized newsletter with AI agents.

Options:
  -c, --config <path>      Configuration file (default: config/interests.yaml)
  -o, --output-dir <dir>   Report directory (default: ${REPORT_CONFIG.DEFAULT_OUTPUT_DIR})
  -v, --verbose            Enable debug logging
  -h, --help               Show this message`;

export interface CliOptions {
  readonly configPath: string;
  readonly outputDir: string;
  readonly verbose: boolean;
  readonly help: boolean;
}

/**
 * Overridable collaborators; tests replace the model and tools.
 */
export interface CliDeps {
  readonly env?: NodeJS.ProcessEnv;
  readonly generateText?: GenerateTextFn;
  readonly resolveModel?: ModelResolver;
  readonly tools?: readonly AgentTool[];
  readonly clock?: Clock;
  readonly stdout?: (line: string) => void;
  readonly stderr?: (line: string) => void;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      config: { type: 'string', short: 'c' },
      'output-dir': { type: 'string', short: 'o' },
      verbose: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    configPath: values.config ?? DEFAULT_CONFIG_PATH,
    outputDir: values['output-dir'] ?? REPORT_CONFIG.DEFAULT_OUTPUT_DIR,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

export function formatConfigSummary(config: NewsletterConfig): string[] {
  const preview = config.interests.slice(0, 3).join(', ');
  const more = config.interests.length > 3 ? '...' : '';
  return [
    'Configuration Summary:',
    `  • Interests: ${config.interests.length} topics`,
    `    - ${preview}${more}`,
    `  • Newsletter tone: ${config.newsletter.tone}`,
    `  • Max stories: ${config.newsletter.max_stories}`,
    `  • Output format: ${config.output.format}`,
  ];
}

function describeFailure(error: unknown): string {
  if (error instanceof ConfigurationError) {
    return `Configuration error: ${error.message}`;
  }
  if (isNewsletterError(error)) {
    return `Newsletter generation failed: ${error.message}`;
  }
  return `Unexpected error: ${errorMessage(error)}`;
}

/**
 * Runs the CLI and resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    stderr(errorMessage(error));
    stderr(USAGE);
    return 1;
  }

  if (options.help) {
    stdout(USAGE);
    return 0;
  }

  const env = loadRuntimeEnv(deps.env ?? process.env);
  configureLogger({ verbose: options.verbose, format: env.logFormat });
  const clock = deps.clock ?? systemClock;

  try {
    const config = await loadConfig(options.configPath);
    stdout(`Loaded configuration from ${options.configPath}`);
    formatConfigSummary(config).forEach((line) => stdout(line));

    const resolveModel = deps.resolveModel ?? createModelResolver(env);
    const tools = deps.tools ?? createSearchTools({ content: config.content, env, clock });

    const result = await generateNewsletter(config, {
      generateText: deps.generateText ?? generateText,
      resolveModel,
      tools,
      clock,
    });

    const reportPath = await saveReport(result.report, { outputDir: options.outputDir, clock });
    stdout(`Curated ${result.stories.length} stories from ${result.collectedStories.length} collected`);
    stdout(`Saved report to ${reportPath}`);
    return 0;
  } catch (error) {
    stderr(describeFailure(error));
    return 1;
  }
}

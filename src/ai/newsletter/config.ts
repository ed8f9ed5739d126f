/**
 * Newsletter Pipeline Configuration
 *
 * Tuning parameters for every pipeline stage. Reader-facing settings
 * (interests, tone, source toggles) live in the YAML configuration under
 * `src/config/`; the values here are engineering constants.
 */

// ============================================================================
// Configuration Validation
// ============================================================================

/**
 * Thrown at module load time if the constants below are inconsistent.
 */
class PipelineConfigError extends Error {
  constructor(message: string) {
    super(`Newsletter pipeline config error: ${message}`);
    this.name = 'PipelineConfigError';
  }
}

function validatePositive(value: number, name: string): void {
  if (value <= 0) {
    throw new PipelineConfigError(`${name} must be positive (got ${value})`);
  }
}

function validateNonNegative(value: number, name: string): void {
  if (value < 0) {
    throw new PipelineConfigError(`${name} cannot be negative (got ${value})`);
  }
}

function validateTemperature(value: number, name: string): void {
  if (value < 0 || value > 2) {
    throw new PipelineConfigError(`${name} must be between 0 and 2 (got ${value})`);
  }
}

function validateMinMax(minValue: number, maxValue: number, minName: string, maxName: string): void {
  if (minValue > maxValue) {
    throw new PipelineConfigError(
      `${minName} (${minValue}) cannot be greater than ${maxName} (${maxValue})`
    );
  }
}

// ============================================================================
// Story Constraints
// ============================================================================

export const STORY_CONSTRAINTS = {
  MIN_SCORE: 1,
  MAX_SCORE: 10,
} as const;

// ============================================================================
// Planner Agent Configuration
// ============================================================================

export const PLANNER_CONFIG = {
  /**
   * Temperature for planner calls. Zero keeps the task list stable
   * between runs with the same interests.
   */
  TEMPERATURE: 0,
  /** Timeout per model call in milliseconds */
  TIMEOUT_MS: 60_000,
} as const;

// ============================================================================
// Scout Agent Configuration
// ============================================================================

export const SCOUT_CONFIG = {
  TEMPERATURE: 0,
  /** Tool rounds before the loop is forced into final extraction */
  MAX_TOOL_ITERATIONS: 3,
  /** Stories kept per research task */
  MAX_STORIES: 5,
  /** Timeout per model call in milliseconds */
  TIMEOUT_MS: 90_000,
  /** Timeout per tool execution in milliseconds */
  TOOL_TIMEOUT_MS: 20_000,
  /** Results requested from each search tool */
  SEARCH_RESULTS: 5,
  /** Characters of tool output echoed at debug level */
  TOOL_OUTPUT_LOG_CHARS: 200,
} as const;

// ============================================================================
// Evaluator Agent Configuration
// ============================================================================

export const EVALUATOR_CONFIG = {
  TEMPERATURE: 0,
  /** Follow-up scouting rounds the evaluator may commission */
  MAX_FOLLOWUP_CYCLES: 1,
  /** Follow-up tasks honored per evaluation pass */
  MAX_INVESTIGATOR_TASKS: 1,
  /** Newest stories previewed in the cycle summary */
  CYCLE_PREVIEW_SIZE: 3,
  TIMEOUT_MS: 90_000,
} as const;

// ============================================================================
// Writer Agent Configuration
// ============================================================================

export const WRITER_CONFIG = {
  /** Slightly above zero so the tone setting has room to show */
  TEMPERATURE: 0.4,
  TIMEOUT_MS: 120_000,
} as const;

// ============================================================================
// Retry Configuration
// ============================================================================

export const RETRY_CONFIG = {
  /** Maximum number of retry attempts */
  MAX_RETRIES: 3,
  /** Initial delay in milliseconds before first retry */
  INITIAL_DELAY_MS: 1000,
  /** Maximum delay in milliseconds between retries */
  MAX_DELAY_MS: 10000,
  /** Multiplier for exponential backoff */
  BACKOFF_MULTIPLIER: 2,
} as const;

// ============================================================================
// Report Output Configuration
// ============================================================================

export const REPORT_CONFIG = {
  DEFAULT_OUTPUT_DIR: 'data/outputs',
  FILE_PREFIX: 'newsletter',
  FILE_EXTENSION: 'md',
} as const;

// ============================================================================
// Module Load Validation
// ============================================================================

function validateConfiguration(): void {
  validatePositive(STORY_CONSTRAINTS.MIN_SCORE, 'STORY_CONSTRAINTS.MIN_SCORE');
  validateMinMax(
    STORY_CONSTRAINTS.MIN_SCORE,
    STORY_CONSTRAINTS.MAX_SCORE,
    'STORY_CONSTRAINTS.MIN_SCORE',
    'STORY_CONSTRAINTS.MAX_SCORE'
  );

  validateTemperature(PLANNER_CONFIG.TEMPERATURE, 'PLANNER_CONFIG.TEMPERATURE');
  validateTemperature(SCOUT_CONFIG.TEMPERATURE, 'SCOUT_CONFIG.TEMPERATURE');
  validateTemperature(EVALUATOR_CONFIG.TEMPERATURE, 'EVALUATOR_CONFIG.TEMPERATURE');
  validateTemperature(WRITER_CONFIG.TEMPERATURE, 'WRITER_CONFIG.TEMPERATURE');

  validatePositive(PLANNER_CONFIG.TIMEOUT_MS, 'PLANNER_CONFIG.TIMEOUT_MS');
  validatePositive(SCOUT_CONFIG.TIMEOUT_MS, 'SCOUT_CONFIG.TIMEOUT_MS');
  validatePositive(SCOUT_CONFIG.TOOL_TIMEOUT_MS, 'SCOUT_CONFIG.TOOL_TIMEOUT_MS');
  validatePositive(EVALUATOR_CONFIG.TIMEOUT_MS, 'EVALUATOR_CONFIG.TIMEOUT_MS');
  validatePositive(WRITER_CONFIG.TIMEOUT_MS, 'WRITER_CONFIG.TIMEOUT_MS');

  validatePositive(SCOUT_CONFIG.MAX_TOOL_ITERATIONS, 'SCOUT_CONFIG.MAX_TOOL_ITERATIONS');
  validatePositive(SCOUT_CONFIG.MAX_STORIES, 'SCOUT_CONFIG.MAX_STORIES');
  validatePositive(SCOUT_CONFIG.SEARCH_RESULTS, 'SCOUT_CONFIG.SEARCH_RESULTS');

  validateNonNegative(EVALUATOR_CONFIG.MAX_FOLLOWUP_CYCLES, 'EVALUATOR_CONFIG.MAX_FOLLOWUP_CYCLES');
  validatePositive(EVALUATOR_CONFIG.MAX_INVESTIGATOR_TASKS, 'EVALUATOR_CONFIG.MAX_INVESTIGATOR_TASKS');
  validatePositive(EVALUATOR_CONFIG.CYCLE_PREVIEW_SIZE, 'EVALUATOR_CONFIG.CYCLE_PREVIEW_SIZE');

  validateNonNegative(RETRY_CONFIG.MAX_RETRIES, 'RETRY_CONFIG.MAX_RETRIES');
  validatePositive(RETRY_CONFIG.INITIAL_DELAY_MS, 'RETRY_CONFIG.INITIAL_DELAY_MS');
  validateMinMax(
    RETRY_CONFIG.INITIAL_DELAY_MS,
    RETRY_CONFIG.MAX_DELAY_MS,
    'RETRY_CONFIG.INITIAL_DELAY_MS',
    'RETRY_CONFIG.MAX_DELAY_MS'
  );
  validatePositive(RETRY_CONFIG.BACKOFF_MULTIPLIER, 'RETRY_CONFIG.BACKOFF_MULTIPLIER');
}

// Run validation at module load time
validateConfiguration();

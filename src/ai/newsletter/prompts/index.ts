/**
 * Newsletter Prompts
 *
 * System and user prompts for each pipeline stage.
 */

export * from './planner-prompts';
export * from './scout-prompts';
export * from './evaluator-prompts';
export * from './writer-prompts';

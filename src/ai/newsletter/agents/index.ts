/**
 * Newsletter Agents
 */

export * from './planner';
export * from './scout';
export * from './evaluator';
export * from './writer';

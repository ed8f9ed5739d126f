/**
 * Phase Timer
 *
 * Tracks how long each pipeline stage took. Follow-up scouting runs inside
 * the evaluator stage and is counted there.
 */

import { PIPELINE_STAGES, systemClock, type Clock, type PipelineStage } from './types';

export type PhaseDurations = Readonly<Record<PipelineStage, number>>;

/**
 * @example
 * const timer = new PhaseTimer(clock);
 * timer.start('planner');
 * // ... run the planner ...
 * timer.end('planner');
 * timer.getDurations(); // { planner: 1500, scout: 0, evaluator: 0, writer: 0 }
 */
export class PhaseTimer {
  private readonly clock: Clock;
  private readonly startTimes = new Map<PipelineStage, number>();
  private readonly durations = new Map<PipelineStage, number>();

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  /**
   * Starts timing a phase, restarting it if it was already running.
   */
  start(phase: PipelineStage): void {
    this.startTimes.set(phase, this.clock.now());
  }

  /**
   * Ends a phase and records its duration (0 if it was never started).
   */
  end(phase: PipelineStage): number {
    const startTime = this.startTimes.get(phase);
    // A start time of 0 is valid
    const duration = startTime !== undefined ? this.clock.now() - startTime : 0;
    this.durations.set(phase, duration);
    this.startTimes.delete(phase);
    return duration;
  }

  /**
   * Times an async phase, recording the duration even if it throws.
   */
  async measure<T>(phase: PipelineStage, fn: () => Promise<T>): Promise<T> {
    this.start(phase);
    try {
      return await fn();
    } finally {
      this.end(phase);
    }
  }

  getDuration(phase: PipelineStage): number {
    return this.durations.get(phase) ?? 0;
  }

  getDurations(): PhaseDurations {
    return {
      planner: this.getDuration('planner'),
      scout: this.getDuration('scout'),
      evaluator: this.getDuration('evaluator'),
      writer: this.getDuration('writer'),
    };
  }

  getTotalDuration(): number {
    return PIPELINE_STAGES.reduce((total, phase) => total + this.getDuration(phase), 0);
  }

  isRunning(phase: PipelineStage): boolean {
    return this.startTimes.has(phase);
  }
}

/** Reference point a {@link Timing} is relative to. */
export type Timepoint = "start" | "end" | "global_start" | "global_end";

/** A point in time: a timepoint shifted by a constant delay. */
export interface Timing {
  readonly timepoint: Timepoint;
  readonly delay: number;
}

export interface TimeInterval {
  readonly lower: Timing;
  readonly upper: Timing;
  readonly isLeftOpen: boolean;
  readonly isRightOpen: boolean;
}

export function startTiming(delay = 0): Timing {
  return { timepoint: "start", delay };
}

export function endTiming(delay = 0): Timing {
  return { timepoint: "end", delay };
}

export function globalStartTiming(delay = 0): Timing {
  return { timepoint: "global_start", delay };
}

export function globalEndTiming(delay = 0): Timing {
  return { timepoint: "global_end", delay };
}

export function timePointInterval(timing: Timing): TimeInterval {
  return { lower: timing, upper: timing, isLeftOpen: false, isRightOpen: false };
}

export function closedTimeInterval(lower: Timing, upper: Timing): TimeInterval {
  return { lower, upper, isLeftOpen: false, isRightOpen: false };
}

export function openTimeInterval(lower: Timing, upper: Timing): TimeInterval {
  return { lower, upper, isLeftOpen: true, isRightOpen: true };
}

export function leftOpenTimeInterval(lower: Timing, upper: Timing): TimeInterval {
  return { lower, upper, isLeftOpen: true, isRightOpen: false };
}

export function rightOpenTimeInterval(lower: Timing, upper: Timing): TimeInterval {
  return { lower, upper, isLeftOpen: false, isRightOpen: true };
}

export function timingEquals(left: Timing, right: Timing): boolean {
  return left.timepoint === right.timepoint && left.delay === right.delay;
}

export function isStartTiming(timing: Timing): boolean {
  return timing.timepoint === "start" && timing.delay === 0;
}

export function isEndTiming(timing: Timing): boolean {
  return timing.timepoint === "end" && timing.delay === 0;
}

export function isPointInterval(interval: TimeInterval): boolean {
  return timingEquals(interval.lower, interval.upper) && !interval.isLeftOpen && !interval.isRightOpen;
}

export function timingToString(timing: Timing): string {
  if (timing.delay === 0) {
    return timing.timepoint;
  }
  return timing.delay > 0 ? `${timing.timepoint} + ${timing.delay}` : `${timing.timepoint} - ${-timing.delay}`;
}

export function intervalToString(interval: TimeInterval): string {
  if (isPointInterval(interval)) {
    return `[${timingToString(interval.lower)}]`;
  }
  const left = interval.isLeftOpen ? "(" : "[";
  const right = interval.isRightOpen ? ")" : "]";
  return `${left}${timingToString(interval.lower)}, ${timingToString(interval.upper)}${right}`;
}

/** Map key identifying a timing by value. */
export function timingKey(timing: Timing): string {
  return timingToString(timing);
}

/** Map key identifying an interval by value. */
export function intervalKey(interval: TimeInterval): string {
  return intervalToString(interval);
}

/**
* System-managed document timestamps.
*
* createdAt is fixed at first persistence. updatedAt moves on every
* persistence and strictly increases, even when the clock has not.
*/

export interface Timestamps {
  createdAt: Date;
  updatedAt: Date;
}

export function stampTimestamps(previous: Timestamps | undefined, now: Date = new Date()): Timestamps {
  if (!previous) {
    return { createdAt: now, updatedAt: now };
  }

  const floor = previous.updatedAt.getTime() + 1;
  return {
    createdAt: previous.createdAt,
    updatedAt: now.getTime() >= floor ? now : new Date(floor),
  };
}

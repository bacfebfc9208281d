export type RandomSource = () => number;

export const MAX_RESULTS = 20;

/**
 * Uniform sample of `count` items without replacement. Returns every item
 * (in random order) when `count` is at least the input length.
 */
export function sampleWithoutReplacement<T>(items: readonly T[], count: number, random: RandomSource = Math.random): T[] {
  const pool = items.slice();
  const take = Math.max(0, Math.min(Math.floor(count), pool.length));

  // partial Fisher-Yates: the first `take` slots end up as the sample
  for (let index = 0; index < take; index += 1) {
    const pick = index + randomIndex(pool.length - index, random);
    swap(pool, index, pick);
  }

  return pool.slice(0, take);
}

export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const result = items.slice();
  for (let index = result.length - 1; index > 0; index -= 1) {
    swap(result, index, randomIndex(index + 1, random));
  }
  return result;
}

export type SlotAllocation = {
  primary: number;
  secondary: number;
};

/**
 * Splits `cap` between two result sets. The primary set gets at most half;
 * the secondary set gets whatever the primary did not claim. Capacity the
 * secondary set cannot fill is not handed back to the primary.
 */
export function allocateSlots(primaryCount: number, secondaryCount: number, cap: number = MAX_RESULTS): SlotAllocation {
  if (primaryCount > 0 && secondaryCount > 0) {
    const primary = Math.min(primaryCount, Math.floor(cap / 2));
    const secondary = Math.min(secondaryCount, cap - primary);
    return { primary, secondary };
  }

  return {
    primary: Math.min(primaryCount, cap),
    secondary: Math.min(secondaryCount, cap)
  };
}

export function balancedSample<T>(
  primary: readonly T[],
  secondary: readonly T[],
  cap: number = MAX_RESULTS,
  random: RandomSource = Math.random
): T[] {
  const slots = allocateSlots(primary.length, secondary.length, cap);
  const selection = [
    ...sampleWithoutReplacement(primary, slots.primary, random),
    ...sampleWithoutReplacement(secondary, slots.secondary, random)
  ];
  return shuffle(selection, random);
}

function randomIndex(length: number, random: RandomSource): number {
  const value = random();
  const index = Math.floor(value * length);
  // guards against a random source that returns exactly 1
  return Math.min(Math.max(index, 0), length - 1);
}

function swap<T>(items: T[], left: number, right: number): void {
  if (left === right) return;
  const leftValue = items[left];
  const rightValue = items[right];
  if (leftValue === undefined || rightValue === undefined) return;
  items[left] = rightValue;
  items[right] = leftValue;
}

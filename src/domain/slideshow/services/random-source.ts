const UINT32_RANGE = 4294967296;

export interface RandomSource {
  /** Uniform value in `[0, 1)`. */
  next(): number;
}

export const systemRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * 32-bit linear congruential generator. Each source owns its state, so two
 * sources seeded alike never interfere with each other.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = toUint32(seed);

  return {
    next: () => {
      state = (state * 1664525 + 1013904223) % UINT32_RANGE;
      return state / UINT32_RANGE;
    },
  };
}

export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? systemRandom : createSeededRandom(seed);
}

/**
 * Maps user supplied seeds onto the generator's 32-bit state space.
 * Integer-looking strings keep their numeric value, anything else is hashed.
 */
export function normalizeSeed(seed: number | string): number | undefined {
  if (typeof seed === 'number') {
    return Number.isFinite(seed) ? toUint32(seed) : undefined;
  }

  const trimmed = seed.trim();
  if (trimmed === '') {
    return undefined;
  }

  if (/^[+-]?\d+$/.test(trimmed)) {
    return toUint32(Number.parseInt(trimmed, 10));
  }

  return hashString(trimmed);
}

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random.next();
}

export function pickIndex(random: RandomSource, length: number): number {
  return Math.min(length - 1, Math.floor(random.next() * length));
}

function toUint32(value: number): number {
  const integer = Math.trunc(value) % UINT32_RANGE;
  return integer < 0 ? integer + UINT32_RANGE : integer;
}

function hashString(value: string): number {
  let hash = 0;
  for (let index = 0; index < value.length; index += 1) {
    hash = (hash << 5) - hash + value.charCodeAt(index);
    hash |= 0;
  }
  return hash >>> 0;
}

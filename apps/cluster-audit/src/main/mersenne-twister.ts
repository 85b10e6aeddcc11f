const N = 624;
const M = 397;
const MATRIX_A = 0x9908b0df;
const UPPER_MASK = 0x80000000;
const LOWER_MASK = 0x7fffffff;

/**
 * MT19937 seeded through `init_by_array` over the seed's 32-bit words.
 */
export class MersenneTwister {
  private readonly state = new Uint32Array(N);
  private index = N + 1;

  constructor(seed: number) {
    this.seed(seed);
  }

  seed(seed: number): void {
    if (!Number.isSafeInteger(seed)) {
      throw new RangeError(`Seed must be a safe integer, got ${seed}`);
    }
    this.initByArray(seedToKey(seed));
  }

  initGenrand(seed: number): void {
    const mt = this.state;
    mt[0] = seed >>> 0;
    for (let i = 1; i < N; i += 1) {
      const prev = mt[i - 1] ^ (mt[i - 1] >>> 30);
      mt[i] = (Math.imul(1812433253, prev) + i) >>> 0;
    }
    this.index = N;
  }

  private initByArray(key: readonly number[]): void {
    const mt = this.state;
    this.initGenrand(19650218);
    let i = 1;
    let j = 0;
    for (let k = Math.max(N, key.length); k > 0; k -= 1) {
      const prev = mt[i - 1] ^ (mt[i - 1] >>> 30);
      mt[i] = ((mt[i] ^ Math.imul(prev, 1664525)) + key[j] + j) >>> 0;
      i += 1;
      j += 1;
      if (i >= N) {
        mt[0] = mt[N - 1];
        i = 1;
      }
      if (j >= key.length) j = 0;
    }
    for (let k = N - 1; k > 0; k -= 1) {
      const prev = mt[i - 1] ^ (mt[i - 1] >>> 30);
      mt[i] = ((mt[i] ^ Math.imul(prev, 1566083941)) - i) >>> 0;
      i += 1;
      if (i >= N) {
        mt[0] = mt[N - 1];
        i = 1;
      }
    }
    mt[0] = UPPER_MASK;
  }

  private twist(): void {
    const mt = this.state;
    for (let kk = 0; kk < N; kk += 1) {
      const y = (mt[kk] & UPPER_MASK) | (mt[(kk + 1) % N] & LOWER_MASK);
      const mag = y & 1 ? MATRIX_A : 0;
      mt[kk] = (mt[(kk + M) % N] ^ (y >>> 1) ^ mag) >>> 0;
    }
    this.index = 0;
  }

  nextUint32(): number {
    if (this.index >= N) {
      this.twist();
    }
    let y = this.state[this.index];
    this.index += 1;
    y ^= y >>> 11;
    y ^= (y << 7) & 0x9d2c5680;
    y ^= (y << 15) & 0xefc60000;
    y ^= y >>> 18;
    return y >>> 0;
  }

  /** Float in [0, 1) with 53 bits of precision. */
  random(): number {
    const a = this.nextUint32() >>> 5;
    const b = this.nextUint32() >>> 6;
    return (a * 67108864 + b) / 9007199254740992;
  }

  getRandBits(bits: number): number {
    if (!Number.isInteger(bits) || bits < 1 || bits > 32) {
      throw new RangeError(`Bit count must be between 1 and 32, got ${bits}`);
    }
    return this.nextUint32() >>> (32 - bits);
  }

  /** Uniform integer in [0, n) by rejection sampling. */
  randBelow(n: number): number {
    if (!Number.isInteger(n) || n < 1 || n > 0xffffffff) {
      throw new RangeError(`Upper bound must be between 1 and 2^32 - 1, got ${n}`);
    }
    const bits = bitLength(n);
    let r = this.getRandBits(bits);
    while (r >= n) {
      r = this.getRandBits(bits);
    }
    return r;
  }
}

export const bitLength = (value: number): number => 32 - Math.clz32(value);

const seedToKey = (seed: number): number[] => {
  let remaining = Math.abs(seed);
  if (remaining === 0) return [0];
  const key: number[] = [];
  while (remaining > 0) {
    key.push(remaining % 0x100000000);
    remaining = Math.floor(remaining / 0x100000000);
  }
  return key;
};

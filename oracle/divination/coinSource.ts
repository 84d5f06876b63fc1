import { randomInt } from "node:crypto";

export type CoinFace = "heads" | "tails";

/** One coin toss per call. */
export interface CoinSource {
  flip(): CoinFace;
}

/** Fresh, unshared crypto-backed source. */
export function randomCoinSource(): CoinSource {
  return {
    flip: () => (randomInt(2) === 0 ? "heads" : "tails"),
  };
}

function makeRng(seed: number): () => number {
  // xorshift32 never leaves a zero state
  let x = seed >>> 0 || 0x9e3779b9;
  return () => {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    return (x >>> 0) / 0x100000000;
  };
}

/** Reproducible source: the same seed always yields the same tosses. */
export function seededCoinSource(seed: number): CoinSource {
  const rng = makeRng(seed);
  return {
    flip: () => (rng() < 0.5 ? "heads" : "tails"),
  };
}

/** Replays the given faces in order and throws once they run out. */
export function scriptedCoinSource(faces: readonly CoinFace[]): CoinSource {
  let i = 0;
  return {
    flip: () => {
      const face = faces[i];
      if (face === undefined) {
        throw new Error(`Scripted coin source exhausted after ${faces.length} flips`);
      }
      i++;
      return face;
    },
  };
}

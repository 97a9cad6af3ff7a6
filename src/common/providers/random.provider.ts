export const RANDOM_SOURCE = 'RANDOM_SOURCE';

export interface RandomSource {
  /** Uniform integer in `[min, max]`, both ends inclusive. */
  nextInt(min: number, max: number): number;
}

export const mathRandomSource: RandomSource = {
  nextInt(min: number, max: number): number {
    return min + Math.floor(Math.random() * (max - min + 1));
  },
};

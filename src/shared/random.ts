import { randomInt } from 'crypto'

export interface RandomSource {
  /** Uniform integer in [min, max], both inclusive */
  int(min: number, max: number): number
}

export const secureRandom: RandomSource = {
  int: (min, max) => randomInt(min, max + 1),
}

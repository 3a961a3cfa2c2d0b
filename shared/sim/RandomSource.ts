export interface RandomSource {
  /** Uniform in [0, 1). */
  next(): number;
  /** Uniform integer in [min, max], both ends inclusive. */
  nextInt(min: number, max: number): number;
  nextRange(min: number, max: number): number;
}

export class MathRandomSource implements RandomSource {
  next(): number {
    return Math.random();
  }

  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  nextRange(min: number, max: number): number {
    return min + this.next() * (max - min);
  }
}

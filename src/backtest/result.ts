import type { EquityPoint } from './types.js';

/** Account value per simulated date, in calendar order. Immutable. */
export class BacktestResult {
  readonly points: readonly EquityPoint[];

  constructor(points: EquityPoint[]) {
    this.points = Object.freeze(points.map((p) => Object.freeze({ date: p.date, value: p.value })));
    Object.freeze(this);
  }

  get dates(): string[] {
    return this.points.map((p) => p.date);
  }

  get values(): number[] {
    return this.points.map((p) => p.value);
  }

  get length(): number {
    return this.points.length;
  }

  get finalValue(): number | null {
    return this.points.length > 0 ? this.points[this.points.length - 1].value : null;
  }

  toRecords(): Array<{ date: string; accountValue: number }> {
    return this.points.map((p) => ({ date: p.date, accountValue: p.value }));
  }
}

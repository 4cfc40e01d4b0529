import { addMilliseconds } from "date-fns";

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};

/** Clock that only moves when told to; used to simulate elapsed time. */
export class ManualClock implements Clock {
  private current: Date;

  constructor(start: Date | string = "2024-10-27T09:00:00.000Z") {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(seconds: number): Date {
    this.current = addMilliseconds(this.current, Math.round(seconds * 1000));
    return this.now();
  }

  set(value: Date | string): void {
    this.current = new Date(value);
  }
}

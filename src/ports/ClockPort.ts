export interface ClockPort {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

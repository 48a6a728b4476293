export * from './SystemClock';
export * from './TimerSleeper';

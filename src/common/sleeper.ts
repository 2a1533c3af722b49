export type Sleeper = (ms: number) => Promise<void>;

export const SLEEPER = Symbol('SLEEPER');

export const realSleep: Sleeper = ms => new Promise(resolve => setTimeout(resolve, ms));

/** Injected time source; every time-dependent component takes one. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Timestamps are stored as ISO-8601 text so that lexical order matches
 * chronological order in SQLite comparisons.
 */

export const addHours = (date: Date, hours: number): Date =>
  new Date(date.getTime() + hours * 60 * 60 * 1000);

export const addMinutes = (date: Date, minutes: number): Date =>
  new Date(date.getTime() + minutes * 60 * 1000);

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

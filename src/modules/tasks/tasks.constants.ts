export const TASK_READ_REPOSITORY = 'TASK_READ_REPOSITORY';
export const CURSOR_OPTIONS = 'CURSOR_OPTIONS';
export const CLOCK = 'CLOCK';

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export const Repeat = {
  None: 'NONE',
  Daily: 'DAILY',
  Weekly: 'WEEKLY',
  Monthly: 'MONTHLY',
} as const;

export type Repeat = (typeof Repeat)[keyof typeof Repeat];

export const RepeatRank: Record<Repeat, number> = {
  [Repeat.None]: 0,
  [Repeat.Daily]: 1,
  [Repeat.Weekly]: 2,
  [Repeat.Monthly]: 3,
};

export const DEFAULT_REPEAT: Repeat = Repeat.None;

export function isRepeat(value: string): value is Repeat {
  return Object.prototype.hasOwnProperty.call(RepeatRank, value);
}

export const Priority = {
  Low: 'LOW',
  Medium: 'MEDIUM',
  High: 'HIGH',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

/** Domain order used for sorting: LOW < MEDIUM < HIGH */
export const PriorityRank: Record<Priority, number> = {
  [Priority.Low]: 0,
  [Priority.Medium]: 1,
  [Priority.High]: 2,
};

export const DEFAULT_PRIORITY: Priority = Priority.Medium;

export function isPriority(value: string): value is Priority {
  return Object.prototype.hasOwnProperty.call(PriorityRank, value);
}

export const Priority = {
  High: 'high',
  Medium: 'medium',
  Low: 'low',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const DEFAULT_PRIORITY: Priority = Priority.Medium;

export const PriorityName: Record<Priority, string> = {
  [Priority.High]: 'High',
  [Priority.Medium]: 'Medium',
  [Priority.Low]: 'Low',
};

/** Ascending display rank: high first */
export const PriorityRank: Record<Priority, number> = {
  [Priority.High]: 0,
  [Priority.Medium]: 1,
  [Priority.Low]: 2,
};

export const PRIORITIES: readonly Priority[] = [Priority.High, Priority.Medium, Priority.Low];

export function isPriority(value: unknown): value is Priority {
  return PRIORITIES.some((p) => p === value);
}

/** Urgency rating attached by `classify`; a lower number is more urgent */
export const Priority = {
  High: 1,
  Medium: 2,
  Low: 3,
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PriorityName: Record<Priority, string> = {
  [Priority.High]: 'High',
  [Priority.Medium]: 'Medium',
  [Priority.Low]: 'Low',
};

const BY_NAME: ReadonlyMap<string, Priority> = new Map(
  Object.values(Priority).map((level): [string, Priority] => [PriorityName[level].toLowerCase(), level]),
);

/** Look up a level by name, ignoring case */
export function priorityFromName(name: string): Priority | null {
  return BY_NAME.get(name.toLowerCase()) ?? null;
}

import { ValidationError } from '../errors.js';

export const Priority = {
  High: 'high',
  Medium: 'medium',
  Low: 'low',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PRIORITIES: readonly Priority[] = [Priority.High, Priority.Medium, Priority.Low];

export const PriorityName: Record<Priority, string> = {
  [Priority.High]: 'High',
  [Priority.Medium]: 'Medium',
  [Priority.Low]: 'Low',
};

export function isPriority(value: string): value is Priority {
  return (PRIORITIES as readonly string[]).includes(value);
}

/** Parse a priority string (case-insensitive). Unknown values are rejected. */
export function parsePriority(value: string): Priority {
  const normalized = value.trim().toLowerCase();
  if (isPriority(normalized)) return normalized;
  throw new ValidationError(
    `Invalid priority '${value}'. Expected one of: ${PRIORITIES.join(', ')}`,
    { field: 'priority', value },
  );
}

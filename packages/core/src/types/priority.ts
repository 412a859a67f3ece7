export const Priority = {
  Required: 'required',
  Optional: 'optional',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PriorityName: Record<Priority, string> = {
  [Priority.Required]: 'Required',
  [Priority.Optional]: 'Optional',
};

export const DEFAULT_PRIORITY: Priority = Priority.Required;

export function isPriority(value: string): value is Priority {
  return value === Priority.Required || value === Priority.Optional;
}

import { describe, it, expect } from 'vitest';
import { Priority, PriorityName, priorityFromName } from '../src/types/priority.js';

describe('priorityFromName', () => {
  it('maps names to levels ignoring case', () => {
    expect(priorityFromName('high')).toBe(Priority.High);
    expect(priorityFromName('MEDIUM')).toBe(Priority.Medium);
    expect(priorityFromName('Low')).toBe(Priority.Low);
  });

  it('returns null for unknown names', () => {
    expect(priorityFromName('urgent')).toBeNull();
    expect(priorityFromName('1')).toBeNull();
  });
});

describe('PriorityName', () => {
  it('names every level', () => {
    expect(Object.values(Priority).map(level => PriorityName[level])).toEqual(['High', 'Medium', 'Low']);
  });
});

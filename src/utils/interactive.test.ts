import { describe, it, expect, beforeEach, vi } from 'vitest';
import inquirer from 'inquirer';
import { BUFFER_CHOICES, bufferChoicesFor, promptFreeTimeOptions } from './interactive.js';

vi.mock('inquirer', () => ({
  default: {
    prompt: vi.fn()
  }
}));

describe('bufferChoicesFor', () => {
  it('should keep the standard choices for a standard value', () => {
    expect(bufferChoicesFor(30)).toEqual(BUFFER_CHOICES);
  });

  it('should add a configured value that is not a standard choice', () => {
    expect(bufferChoicesFor(10)).toEqual([0, 10, 15, 30, 45, 60]);
    expect(bufferChoicesFor(90)).toEqual([0, 15, 30, 45, 60, 90]);
  });
});

describe('promptFreeTimeOptions', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should preselect configured buffers', async () => {
    vi.mocked(inquirer.prompt).mockResolvedValue({});

    await promptFreeTimeOptions({
      startDate: new Date(2025, 0, 21),
      endDate: new Date(2025, 0, 24),
      workStartHour: 9,
      workEndHour: 17,
      bufferBefore: 10,
      bufferAfter: 45
    });

    expect(inquirer.prompt).toHaveBeenCalledWith(expect.arrayContaining([
      expect.objectContaining({
        name: 'bufferBefore',
        choices: [
          { name: '0 min', value: 0 },
          { name: '10 min', value: 10 },
          { name: '15 min', value: 15 },
          { name: '30 min', value: 30 },
          { name: '45 min', value: 45 },
          { name: '60 min', value: 60 }
        ],
        default: 1
      }),
      expect.objectContaining({ name: 'bufferAfter', default: 3 })
    ]));
  });
});

import { describe, it, expect } from 'vitest';
import { partitionProgramProgress } from '../src/programs/progress';
import { course, courseRun, program } from './helpers/catalog';

describe('partitionProgramProgress', () => {
  const p = program('p', 'MicroMasters', [
    course('C1', [courseRun('C1-2024'), courseRun('C1-2025')]),
    course('C2', [courseRun('C2-2025')]),
    course('C3', [courseRun('C3-2025')]),
    course('C4', [courseRun('C4-2025')])
  ]);

  it('buckets courses by passed grades and active enrollments', () => {
    const progress = partitionProgramProgress(p, {
      passedCourseRunKeys: new Set(['C1-2024']),
      enrolledCourseRunKeys: new Set(['C1-2025', 'C3-2025'])
    });

    expect(progress.program).toBe(p);
    expect(progress.completed.map(c => c.key)).toEqual(['C1']);
    expect(progress.inProgress.map(c => c.key)).toEqual(['C3']);
    expect(progress.notStarted.map(c => c.key)).toEqual(['C2', 'C4']);
  });

  it('treats a passed course as completed even when still enrolled', () => {
    const progress = partitionProgramProgress(p, {
      passedCourseRunKeys: new Set(['C2-2025']),
      enrolledCourseRunKeys: new Set(['C2-2025'])
    });

    expect(progress.completed.map(c => c.key)).toEqual(['C2']);
    expect(progress.inProgress).toEqual([]);
  });

  it('leaves every course not started for a new learner', () => {
    const progress = partitionProgramProgress(p, {
      passedCourseRunKeys: new Set(),
      enrolledCourseRunKeys: new Set()
    });

    expect(progress.notStarted.map(c => c.key)).toEqual(['C1', 'C2', 'C3', 'C4']);
  });
});

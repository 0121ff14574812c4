import { describe, test, expect } from 'vitest';
import {
  addSemester,
  calculateCGPA,
  emptyStudent,
  getSemesters
} from '../../src/contexts/grading/domain/aggregates/student-aggregate.js';
import { calculateGPA, emptySemester } from '../../src/contexts/grading/domain/aggregates/semester-aggregate.js';
import { buildSemester, buildStudent } from '../helpers/builders.js';

describe('学生集約', () => {
  test('学期は追加順に保持される', () => {
    const first = buildSemester([[8, 3]]);
    const second = buildSemester([[6, 2]]);

    const student = addSemester(addSemester(emptyStudent(), first), second);

    expect(getSemesters(student)).toEqual([first, second]);
  });

  test('元の学生データは変更されない', () => {
    const original = emptyStudent();

    addSemester(original, buildSemester([[8, 3]]));

    expect(original.semesters).toHaveLength(0);
  });

  describe('calculateCGPA', () => {
    test('全学期の全科目を通して重み付けする', () => {
      const student = buildStudent([[[8, 3], [6, 2]], [[9, 4]]]);

      // (24 + 12 + 36) / 9
      expect(calculateCGPA(student)).toBeCloseTo(8, 10);
      expect(calculateGPA(student.semesters[0] ?? emptySemester())).toBeCloseTo(7.2, 10);
    });

    test('学期GPAの単純平均ではない', () => {
      const student = buildStudent([[[8, 3], [6, 2]], [[7, 2]]]);

      // (24 + 12 + 14) / 7
      expect(calculateCGPA(student)).toBeCloseTo(50 / 7, 10);
      expect(calculateCGPA(student).toFixed(2)).toBe('7.14');
    });

    test('学期がなければ0', () => {
      expect(calculateCGPA(emptyStudent())).toBe(0);
    });

    test('空の学期しかなければ0', () => {
      const student = addSemester(emptyStudent(), emptySemester());

      expect(calculateCGPA(student)).toBe(0);
    });
  });
});

import type { Semester, Student } from '../../src/contexts/grading/domain/entities/grade-types.js';
import {
  addCourse,
  createCourse,
  emptySemester
} from '../../src/contexts/grading/domain/aggregates/semester-aggregate.js';
import { addSemester, emptyStudent } from '../../src/contexts/grading/domain/aggregates/student-aggregate.js';

export type CoursePair = readonly [grade: number, credit: number];

export function buildSemester(pairs: readonly CoursePair[]): Semester {
  return pairs.reduce((semester, [grade, credit]) => {
    const course = createCourse(grade, credit);
    if (!course.success) {
      throw new Error(`invalid test course: ${course.error.message}`);
    }
    return addCourse(semester, course.data.grade, course.data.credit);
  }, emptySemester());
}

export function buildStudent(semesters: readonly (readonly CoursePair[])[]): Student {
  return semesters.reduce(
    (student, pairs) => addSemester(student, buildSemester(pairs)),
    emptyStudent()
  );
}

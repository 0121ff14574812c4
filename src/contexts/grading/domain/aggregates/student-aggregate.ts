import type { Course, Semester, Student } from '../entities/grade-types.js';
import { weightedAverage } from './semester-aggregate.js';

/**
 * 学生集約
 *
 * 学期は読み取り専用の値として受け取る。追加後に呼び出し側から変更される経路はない。
 */

export const emptyStudent = (): Student => ({ semesters: [] });

export function addSemester(student: Student, semester: Semester): Student {
  return { semesters: [...student.semesters, semester] };
}

export function getSemesters(student: Student): readonly Semester[] {
  return student.semesters;
}

function* allCourses(student: Student): Generator<Course> {
  for (const semester of student.semesters) {
    yield* semester.courses;
  }
}

/**
 * 全学期の全科目を通した重み付き平均
 */
export function calculateCGPA(student: Student): number {
  return weightedAverage(allCourses(student));
}

import {
  type Result,
  map,
  parseWith,
  resultPipe
} from '../../../../shared/types/index.js';
import {
  type Course,
  type CreditHours,
  type Grade,
  type Semester,
  CreditHoursSchema,
  GradeSchema
} from '../entities/grade-types.js';
import {
  type ValidationError,
  createInvalidCreditError,
  createInvalidGradeError
} from '../errors/errors.js';

/**
 * 学期集約
 *
 * 組み立て中の学期は addCourse のたびに新しい値として返る。
 * 学生に追加された後は変更されない。
 */

export const emptySemester = (): Semester => ({ courses: [] });

/**
 * 生の数値から Course を作る（範囲外なら ValidationError）
 */
export function createCourse(
  grade: number,
  credit: number
): Result<Course, ValidationError> {
  return resultPipe(parseWith(GradeSchema, grade, () => createInvalidGradeError(grade)))
    .flatMap(validGrade =>
      map(
        parseWith(CreditHoursSchema, credit, () => createInvalidCreditError(credit)),
        (validCredit): Course => ({ grade: validGrade, credit: validCredit })
      )
    )
    .value();
}

/**
 * 科目の追加（範囲の検証は型が保証する）
 */
export function addCourse(
  semester: Semester,
  grade: Grade,
  credit: CreditHours
): Semester {
  return { courses: [...semester.courses, { grade, credit }] };
}

export function getCourses(semester: Semester): readonly Course[] {
  return semester.courses;
}

/**
 * 科目群の合計（単位数と成績ポイント）
 */
function totalCourses(courses: Iterable<Course>): {
  totalCredits: number;
  totalPoints: number;
} {
  let totalCredits = 0;
  let totalPoints = 0;
  for (const course of courses) {
    totalCredits += course.credit;
    totalPoints += course.grade * course.credit;
  }
  return { totalCredits, totalPoints };
}

/**
 * 単位数で重み付けした平均。合計単位数が0なら0。
 */
export function weightedAverage(courses: Iterable<Course>): number {
  const { totalCredits, totalPoints } = totalCourses(courses);
  return totalCredits === 0 ? 0 : totalPoints / totalCredits;
}

export function calculateGPA(semester: Semester): number {
  return weightedAverage(semester.courses);
}

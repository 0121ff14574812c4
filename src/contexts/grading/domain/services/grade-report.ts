import type { Semester, Student } from '../entities/grade-types.js';
import { calculateGPA } from '../aggregates/semester-aggregate.js';
import { calculateCGPA } from '../aggregates/student-aggregate.js';

/**
 * 成績表示の整形（副作用なし、行の配列を返す）
 */

export const formatNumber = (value: number, precision: number): string =>
  value.toFixed(precision);

/**
 * 科目一覧（1始まり）
 */
export function formatCourseLines(semester: Semester, precision: number): string[] {
  return semester.courses.map((course, index) =>
    `Course ${index + 1} | Grade: ${formatNumber(course.grade, precision)} | Credit: ${formatNumber(course.credit, precision)}`
  );
}

/**
 * 全学期の科目・GPAと最終CGPA
 */
export function formatStudentReport(student: Student, precision: number): string[] {
  const lines: string[] = [];
  student.semesters.forEach((semester, index) => {
    lines.push('', `Semester ${index + 1}:`);
    lines.push(...formatCourseLines(semester, precision));
    lines.push(`GPA: ${formatNumber(calculateGPA(semester), precision)}`);
  });
  lines.push('', `Final CGPA: ${formatNumber(calculateCGPA(student), precision)}`);
  return lines;
}

import { z } from 'zod';
import {
  type Result,
  Ok,
  Err,
  mapError,
  parseWith
} from '../../../../shared/types/index.js';
import type { Course, Semester, Student } from '../../domain/entities/grade-types.js';
import {
  type CorruptDataError,
  createCorruptDataError
} from '../../domain/errors/errors.js';
import { IntegerTokenSchema, DecimalTokenSchema } from '../../../../shared/parsing/numeric-schemas.js';
import { addCourse, createCourse, emptySemester } from '../../domain/aggregates/semester-aggregate.js';
import { addSemester, emptyStudent } from '../../domain/aggregates/student-aggregate.js';

/**
 * 成績データファイルの符号化・復号
 *
 * 形式（改行区切りのテキスト、学期ごとに繰り返し）:
 *
 *   <科目数>
 *   <成績> <単位数>
 *   ...
 *
 * 数値は String(n) で書き出すので、読み戻すと同じ値になる。
 */

const CourseCountSchema = IntegerTokenSchema.pipe(z.number().int().nonnegative());

type SourceLine = {
  readonly lineNumber: number;
  readonly fields: readonly string[];
};

export function serializeStudent(student: Student): string {
  const lines: string[] = [];
  for (const semester of student.semesters) {
    lines.push(String(semester.courses.length));
    for (const course of semester.courses) {
      lines.push(`${course.grade} ${course.credit}`);
    }
  }
  return lines.length === 0 ? '' : `${lines.join('\n')}\n`;
}

function toSourceLines(content: string): SourceLine[] {
  return content
    .split(/\r?\n/)
    .map((text, index) => ({
      lineNumber: index + 1,
      fields: text.trim().split(/\s+/).filter(field => field.length > 0)
    }))
    .filter(line => line.fields.length > 0);
}

function parseCourseCount(line: SourceLine, path: string): Result<number, CorruptDataError> {
  const [first] = line.fields;
  if (line.fields.length !== 1 || first === undefined) {
    return Err(createCorruptDataError(path, 'expected a single course count', line.lineNumber));
  }
  return parseWith(CourseCountSchema, first, () =>
    createCorruptDataError(path, `invalid course count "${first}"`, line.lineNumber)
  );
}

function parseCourseLine(line: SourceLine, path: string): Result<Course, CorruptDataError> {
  const [gradeField, creditField] = line.fields;
  if (line.fields.length !== 2 || gradeField === undefined || creditField === undefined) {
    return Err(createCorruptDataError(path, 'expected "<grade> <credit>"', line.lineNumber));
  }

  const grade = parseWith(DecimalTokenSchema, gradeField, () =>
    createCorruptDataError(path, `non-numeric grade "${gradeField}"`, line.lineNumber)
  );
  if (!grade.success) {
    return grade;
  }
  const credit = parseWith(DecimalTokenSchema, creditField, () =>
    createCorruptDataError(path, `non-numeric credit "${creditField}"`, line.lineNumber)
  );
  if (!credit.success) {
    return credit;
  }

  return mapError(createCourse(grade.data, credit.data), error =>
    createCorruptDataError(path, error.message, line.lineNumber)
  );
}

/**
 * ファイル内容から学生データを復元
 *
 * 最初の不正な行で失敗する（部分的な結果は返さない）
 */
export function parseStudent(content: string, path: string): Result<Student, CorruptDataError> {
  const lines = toSourceLines(content);
  let student = emptyStudent();
  let cursor = 0;

  while (cursor < lines.length) {
    const countLine = lines[cursor];
    if (countLine === undefined) {
      break;
    }
    const count = parseCourseCount(countLine, path);
    if (!count.success) {
      return count;
    }
    cursor += 1;

    let semester: Semester = emptySemester();
    for (let index = 0; index < count.data; index++) {
      const courseLine = lines[cursor];
      if (courseLine === undefined) {
        return Err(createCorruptDataError(
          path,
          `semester ${student.semesters.length + 1} declares ${count.data} courses but only ${index} found`
        ));
      }
      const course = parseCourseLine(courseLine, path);
      if (!course.success) {
        return course;
      }
      semester = addCourse(semester, course.data.grade, course.data.credit);
      cursor += 1;
    }

    student = addSemester(student, semester);
  }

  return Ok(student);
}

import { z } from 'zod';

/**
 * 成績ドメインの型定義
 *
 * 成績と単位数はブランド型。検証済みの値からしか Course を作れない。
 */

export const GRADE_MIN = 0;
export const GRADE_MAX = 10;

export const GradeSchema = z.number()
  .finite()
  .min(GRADE_MIN)
  .max(GRADE_MAX)
  .brand<'Grade'>();

export const CreditHoursSchema = z.number()
  .finite()
  .positive()
  .brand<'CreditHours'>();

export type Grade = z.infer<typeof GradeSchema>;
export type CreditHours = z.infer<typeof CreditHoursSchema>;

export const CourseSchema = z.object({
  grade: GradeSchema,
  credit: CreditHoursSchema
});

/** 1科目の成績（学期内の位置以外に識別子を持たない） */
export type Course = Readonly<z.infer<typeof CourseSchema>>;

/** 1学期分の科目（入力順） */
export type Semester = {
  readonly courses: readonly Course[];
};

/** 学生の全学期（追加順） */
export type Student = {
  readonly semesters: readonly Semester[];
};

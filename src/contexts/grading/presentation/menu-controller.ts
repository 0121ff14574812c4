import { type Result, Ok } from '../../../shared/types/index.js';
import type { InputConfig } from '../../../shared/config/index.js';
import { createLogger } from '../../../shared/logging/logger.js';
import type { Course, Semester } from '../domain/entities/grade-types.js';
import type { InputClosedError } from '../domain/errors/errors.js';
import { GRADE_MAX, GRADE_MIN } from '../domain/entities/grade-types.js';
import {
  addCourse,
  createCourse,
  emptySemester
} from '../domain/aggregates/semester-aggregate.js';
import type { GradeBookService } from '../application/grade-book-service.js';
import type { IConsoleOutput } from '../application/ports.js';
import { type InputValidator, INVALID_INPUT_MESSAGE } from './input-validator.js';

const logger = createLogger('menu');

export const MENU_LINES = [
  '',
  '--- CGPA CALCULATOR MENU ---',
  '1. Add Semester',
  '2. Display Result',
  '3. Save to File',
  '4. Load from File',
  '5. Exit'
] as const;

export const MENU_PROMPT = 'Enter choice: ';

export const MenuChoice = {
  AddSemester: 1,
  DisplayResult: 2,
  SaveToFile: 3,
  LoadFromFile: 4,
  Exit: 5
} as const;

/**
 * メニューループ
 *
 * 選択肢を読み、成績簿サービスに振り分ける。Exit か入力終端で抜ける。
 */
export class MenuController {
  constructor(
    private readonly service: GradeBookService,
    private readonly input: InputValidator,
    private readonly output: IConsoleOutput,
    private readonly limits: InputConfig
  ) {}

  async run(): Promise<void> {
    while (true) {
      this.displayMenu();
      const choice = await this.input.promptNumber('', {
        min: MenuChoice.AddSemester,
        max: MenuChoice.Exit,
        kind: 'integer'
      });
      if (!choice.success) {
        logger.info('Input closed, leaving menu');
        return;
      }

      const keepRunning = await this.dispatch(choice.data);
      if (!keepRunning) {
        return;
      }
    }
  }

  private displayMenu(): void {
    for (const line of MENU_LINES) {
      this.output.writeLine(line);
    }
    this.output.write(MENU_PROMPT);
  }

  /**
   * @returns ループを続けるかどうか
   */
  private async dispatch(choice: number): Promise<boolean> {
    switch (choice) {
      case MenuChoice.AddSemester: {
        const semester = await this.readSemester();
        if (!semester.success) {
          return false;
        }
        this.service.addSemester(semester.data);
        return true;
      }
      case MenuChoice.DisplayResult:
        this.service.displayAll();
        return true;
      case MenuChoice.SaveToFile:
        await this.service.saveToFile();
        return true;
      case MenuChoice.LoadFromFile:
        await this.service.loadFromFile();
        return true;
      case MenuChoice.Exit:
        this.output.writeLine('Exiting program.');
        return false;
      default:
        logger.warn('Unknown menu choice', { choice });
        return true;
    }
  }

  /**
   * 科目数・各科目の成績と単位数を読み、学期を組み立てる
   */
  private async readSemester(): Promise<Result<Semester, InputClosedError>> {
    const count = await this.input.promptNumber('Enter number of courses: ', {
      min: 1,
      max: this.limits.maxCoursesPerSemester,
      kind: 'integer'
    });
    if (!count.success) {
      return count;
    }

    let semester = emptySemester();
    for (let index = 0; index < count.data; index++) {
      const course = await this.readCourse();
      if (!course.success) {
        return course;
      }
      semester = addCourse(semester, course.data.grade, course.data.credit);
    }

    return Ok(semester);
  }

  private async readCourse(): Promise<Result<Course, InputClosedError>> {
    while (true) {
      const grade = await this.input.promptNumber(`Enter numeric grade (${GRADE_MIN}–${GRADE_MAX}): `, {
        min: GRADE_MIN,
        max: GRADE_MAX,
        kind: 'real'
      });
      if (!grade.success) {
        return grade;
      }
      const credit = await this.input.promptNumber('Enter credit hours (>0): ', {
        min: this.limits.minCredit,
        max: this.limits.maxCredit,
        kind: 'real'
      });
      if (!credit.success) {
        return credit;
      }

      const course = createCourse(grade.data, credit.data);
      if (course.success) {
        return course;
      }
      // 対話入力の範囲はドメインの範囲内なので通常は起こらない
      logger.warn('Course rejected by domain validation', { reason: course.error.message });
      this.output.writeLine(INVALID_INPUT_MESSAGE);
    }
  }
}

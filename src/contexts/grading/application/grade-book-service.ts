import { type Result, Ok, Err } from '../../../shared/types/index.js';
import { getCurrentConfig } from '../../../shared/config/index.js';
import { createLogger } from '../../../shared/logging/logger.js';
import type { Semester, Student } from '../domain/entities/grade-types.js';
import {
  type LoadError,
  type PersistenceError,
  isDataNotFoundError
} from '../domain/errors/errors.js';
import {
  addSemester,
  calculateCGPA,
  emptyStudent
} from '../domain/aggregates/student-aggregate.js';
import {
  formatCourseLines,
  formatStudentReport
} from '../domain/services/grade-report.js';
import type { IConsoleOutput, IGradeBookRepository } from './ports.js';

const logger = createLogger('grade-book');

export interface GradeBookServiceOptions {
  dataFilePath: string;
  precision: number;
}

/**
 * 成績簿アプリケーションサービス
 *
 * プロセス中に一つだけの学生データを保持し、追加・表示・保存・読み込みを調整する。
 * どの操作も例外を外に出さず、結果を Result と利用者向けメッセージで返す。
 */
export class GradeBookService {
  private student: Student = emptyStudent();
  private readonly options: GradeBookServiceOptions;

  constructor(
    private readonly repository: IGradeBookRepository,
    private readonly output: IConsoleOutput,
    options?: Partial<GradeBookServiceOptions>
  ) {
    const config = getCurrentConfig();
    this.options = {
      dataFilePath: options?.dataFilePath ?? config.storage.dataFilePath,
      precision: options?.precision ?? config.display.precision
    };
  }

  getStudent(): Student {
    return this.student;
  }

  /**
   * 組み立て済みの学期を受け取って追加
   */
  addSemester(semester: Semester): void {
    this.student = addSemester(this.student, semester);
    logger.debug('Semester added', {
      semester: this.student.semesters.length,
      courses: semester.courses.length
    });
  }

  calculateCGPA(): number {
    return calculateCGPA(this.student);
  }

  displayCourses(semester: Semester): void {
    for (const line of formatCourseLines(semester, this.options.precision)) {
      this.output.writeLine(line);
    }
  }

  displayAll(): void {
    for (const line of formatStudentReport(this.student, this.options.precision)) {
      this.output.writeLine(line);
    }
  }

  /**
   * 保存ユースケース
   *
   * 失敗してもメモリ上の学生データはそのまま
   */
  async saveToFile(path: string = this.options.dataFilePath): Promise<Result<void, PersistenceError>> {
    const result = await this.repository.save(path, this.student);
    if (!result.success) {
      logger.debug('Save failed', { path, reason: result.error.message });
      this.output.writeError(`Error saving data: ${result.error.message}`);
      return result;
    }

    logger.info('Data saved', { path, semesters: this.student.semesters.length });
    this.output.writeLine('Data saved successfully.');
    return Ok(undefined);
  }

  /**
   * 読み込みユースケース
   *
   * - ファイルなし: 通知のみ、現在のデータは保持
   * - ファイルあり: 現在のデータを消してから読み込む。失敗すれば空のまま
   */
  async loadFromFile(path: string = this.options.dataFilePath): Promise<Result<Student, LoadError>> {
    const result = await this.repository.load(path);

    if (!result.success && isDataNotFoundError(result.error)) {
      logger.info('No data file', { path });
      this.output.writeLine(result.error.message);
      return result;
    }

    this.student = emptyStudent();

    if (!result.success) {
      logger.debug('Load failed', { path, code: result.error.code, reason: result.error.message });
      this.output.writeError(`Error loading data: ${result.error.message}`);
      return Err(result.error);
    }

    this.student = result.data;
    logger.info('Data loaded', { path, semesters: result.data.semesters.length });
    this.output.writeLine('Data loaded successfully.');
    return Ok(this.student);
  }
}

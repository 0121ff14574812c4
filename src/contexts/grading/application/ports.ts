import type { Result } from '../../../shared/types/index.js';
import type { Student } from '../domain/entities/grade-types.js';
import type { LoadError, PersistenceError } from '../domain/errors/errors.js';

/**
 * ポート＆アダプタ
 *
 * アプリケーション層はファイルシステムや標準入出力を直接知らない。
 * テストではインメモリ実装・スクリプト入力に差し替える。
 */

// === セカンダリポート（永続化） ===

export interface IGradeBookRepository {
  /**
   * 保存データの読み込み
   *
   * @returns 読み込んだ学生データ。ファイルがなければ DataNotFoundError
   */
  load(path: string): Promise<Result<Student, LoadError>>;

  /**
   * 全学期の書き出し（既存ファイルは置き換える）
   */
  save(path: string, student: Student): Promise<Result<void, PersistenceError>>;
}

// === 対話入出力ポート ===

export interface IConsoleOutput {
  /** 改行なしの出力（プロンプト用） */
  write(text: string): void;
  writeLine(line: string): void;
  /** 診断メッセージ（stderr相当） */
  writeError(line: string): void;
}

export interface ILineSource {
  /**
   * 次の1行を読む
   *
   * @returns 入力が終わっていれば null
   */
  readLine(): Promise<string | null>;
}

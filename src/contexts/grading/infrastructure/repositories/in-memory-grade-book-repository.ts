import { type Result, Ok, Err } from '../../../../shared/types/index.js';
import type { Student } from '../../domain/entities/grade-types.js';
import {
  type LoadError,
  type PersistenceError,
  createDataNotFoundError,
  createPersistenceError
} from '../../domain/errors/errors.js';
import type { IGradeBookRepository } from '../../application/ports.js';
import { parseStudent, serializeStudent } from '../persistence/grade-file-codec.js';

/**
 * インメモリリポジトリ実装
 *
 * ファイルシステムの代わりにパスごとのテキストを保持する。
 * 書き出し・読み込みは実ファイルと同じコーデックを通す。
 */
export class InMemoryGradeBookRepository implements IGradeBookRepository {
  private files = new Map<string, string>();
  private failingWrites = new Set<string>();

  async load(path: string): Promise<Result<Student, LoadError>> {
    const content = this.files.get(path);
    if (content === undefined) {
      return Err(createDataNotFoundError(path));
    }
    return parseStudent(content, path);
  }

  async save(path: string, student: Student): Promise<Result<void, PersistenceError>> {
    if (this.failingWrites.has(path)) {
      return Err(createPersistenceError(path, 'write', new Error('permission denied')));
    }
    this.files.set(path, serializeStudent(student));
    return Ok(undefined);
  }

  // === テスト用メソッド ===

  setFileContent(path: string, content: string): void {
    this.files.set(path, content);
  }

  getFileContent(path: string): string | undefined {
    return this.files.get(path);
  }

  failWritesTo(path: string): void {
    this.failingWrites.add(path);
  }
}

import { readFile, writeFile } from 'node:fs/promises';
import {
  type Result,
  Err,
  fromAsync,
  mapError
} from '../../../../shared/types/index.js';
import { createLogger } from '../../../../shared/logging/logger.js';
import type { Student } from '../../domain/entities/grade-types.js';
import {
  type LoadError,
  type PersistenceError,
  createDataNotFoundError,
  createPersistenceError
} from '../../domain/errors/errors.js';
import type { IGradeBookRepository } from '../../application/ports.js';
import { parseStudent, serializeStudent } from '../persistence/grade-file-codec.js';

const logger = createLogger('file-repository');

const isMissingFileError = (error: Error): boolean =>
  'code' in error && error.code === 'ENOENT';

/**
 * テキストファイルによる成績簿リポジトリ
 *
 * readFile / writeFile はどの経路でもファイルハンドルを閉じる
 */
export class FileGradeBookRepository implements IGradeBookRepository {
  constructor(private readonly encoding: BufferEncoding = 'utf8') {}

  async load(path: string): Promise<Result<Student, LoadError>> {
    const readResult = await fromAsync(() => readFile(path, this.encoding));

    if (!readResult.success) {
      if (isMissingFileError(readResult.error)) {
        return Err(createDataNotFoundError(path));
      }
      logger.debug('Failed to read data file', { path, reason: readResult.error.message });
      return Err(createPersistenceError(path, 'read', readResult.error));
    }

    return parseStudent(readResult.data, path);
  }

  async save(path: string, student: Student): Promise<Result<void, PersistenceError>> {
    const content = serializeStudent(student);
    const writeResult = await fromAsync(() => writeFile(path, content, this.encoding));

    return mapError(writeResult, error => {
      logger.debug('Failed to write data file', { path, reason: error.message });
      return createPersistenceError(path, 'write', error);
    });
  }
}

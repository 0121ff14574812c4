import {
  type Result,
  Ok,
  Err,
  parseWith
} from '../../../shared/types/index.js';
import {
  DecimalTokenSchema,
  IntegerTokenSchema
} from '../../../shared/parsing/numeric-schemas.js';
import {
  type InputClosedError,
  type ValidationError,
  createInputClosedError,
  createValidationError
} from '../domain/errors/errors.js';
import type { IConsoleOutput, ILineSource } from '../application/ports.js';

export type NumberKind = 'integer' | 'real';

/** 閉区間 [min, max] */
export interface NumberBounds {
  readonly min: number;
  readonly max: number;
  readonly kind: NumberKind;
}

export const INVALID_INPUT_MESSAGE = 'Invalid input. Please try again.';

/**
 * 1トークンを範囲付きの数値として解釈
 */
export function parseBoundedNumber(
  token: string,
  bounds: NumberBounds
): Result<number, ValidationError> {
  const schema = bounds.kind === 'integer' ? IntegerTokenSchema : DecimalTokenSchema;
  const parsed = parseWith(schema, token, () =>
    createValidationError(`Not a valid ${bounds.kind}: ${token}`, 'INVALID_NUMBER', undefined, token)
  );
  if (!parsed.success) {
    return parsed;
  }

  const value = parsed.data;
  if (value < bounds.min || value > bounds.max) {
    return Err(createValidationError(
      `${value} is outside [${bounds.min}, ${bounds.max}]`,
      'OUT_OF_RANGE',
      undefined,
      value
    ));
  }
  return Ok(value);
}

/**
 * 対話入力の検証付き読み取り
 *
 * 入力は空白区切りのトークン列として扱う。正しい値の後に同じ行に残ったトークンは
 * 次のプロンプトで使われ、不正な値の場合はその行の残りを捨てて再入力させる。
 */
export class InputValidator {
  private pending: string[] = [];

  constructor(
    private readonly source: ILineSource,
    private readonly output: IConsoleOutput
  ) {}

  private async nextToken(): Promise<string | null> {
    while (this.pending.length === 0) {
      const line = await this.source.readLine();
      if (line === null) {
        return null;
      }
      this.pending = line.trim().split(/\s+/).filter(token => token.length > 0);
    }
    return this.pending.shift() ?? null;
  }

  /**
   * 範囲内の値が得られるまでプロンプトを繰り返す（回数制限なし）
   *
   * 入力が終わった場合のみ InputClosedError
   */
  async promptNumber(
    prompt: string,
    bounds: NumberBounds
  ): Promise<Result<number, InputClosedError>> {
    while (true) {
      this.output.write(prompt);
      const token = await this.nextToken();
      if (token === null) {
        return Err(createInputClosedError());
      }

      const parsed = parseBoundedNumber(token, bounds);
      if (parsed.success) {
        return parsed;
      }

      this.output.writeLine(INVALID_INPUT_MESSAGE);
      this.pending = [];
    }
  }
}

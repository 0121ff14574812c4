import { z } from 'zod';

/**
 * 文字列トークンを数値として読むスキーマ
 *
 * Number() は空白や "0x10"・"Infinity" も受け付けるので、書式を正規表現で先に絞る
 */

export const IntegerTokenSchema = z.string()
  .regex(/^[+-]?\d+$/)
  .transform(Number)
  .pipe(z.number().int().safe());

export const DecimalTokenSchema = z.string()
  .regex(/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/)
  .transform(Number)
  .pipe(z.number().finite());

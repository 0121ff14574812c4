import { describe, test, expect } from 'vitest';
import {
  InputValidator,
  parseBoundedNumber,
  type NumberBounds
} from '../../src/contexts/grading/presentation/input-validator.js';
import { ScriptedConsole } from '../helpers/scripted-console.js';

const GRADE_BOUNDS: NumberBounds = { min: 0, max: 10, kind: 'real' };
const CHOICE_BOUNDS: NumberBounds = { min: 1, max: 5, kind: 'integer' };

describe('入力検証', () => {
  describe('parseBoundedNumber', () => {
    test('境界値は含む', () => {
      expect(parseBoundedNumber('0', GRADE_BOUNDS)).toEqual({ success: true, data: 0 });
      expect(parseBoundedNumber('10', GRADE_BOUNDS)).toEqual({ success: true, data: 10 });
    });

    test('指数表記と先頭の小数点を受け付ける', () => {
      expect(parseBoundedNumber('1e1', GRADE_BOUNDS)).toEqual({ success: true, data: 10 });
      expect(parseBoundedNumber('.5', GRADE_BOUNDS)).toEqual({ success: true, data: 0.5 });
    });

    test('範囲外は OUT_OF_RANGE', () => {
      const result = parseBoundedNumber('11', GRADE_BOUNDS);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('OUT_OF_RANGE');
        expect(result.error.message).toBe('11 is outside [0, 10]');
      }
    });

    test('数値でなければ INVALID_NUMBER', () => {
      const result = parseBoundedNumber('abc', GRADE_BOUNDS);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INVALID_NUMBER');
      }
    });

    test('16進表記や Infinity は数値として扱わない', () => {
      expect(parseBoundedNumber('0x5', GRADE_BOUNDS).success).toBe(false);
      expect(parseBoundedNumber('Infinity', GRADE_BOUNDS).success).toBe(false);
    });

    test('整数指定では小数を拒否する', () => {
      expect(parseBoundedNumber('3.5', CHOICE_BOUNDS).success).toBe(false);
      expect(parseBoundedNumber('3', CHOICE_BOUNDS)).toEqual({ success: true, data: 3 });
    });
  });

  describe('InputValidator.promptNumber', () => {
    test('範囲外と非数値を拒否して再入力させる', async () => {
      const terminal = new ScriptedConsole(['11', 'abc', '7']);
      const validator = new InputValidator(terminal, terminal);

      const result = await validator.promptNumber('Enter grade: ', GRADE_BOUNDS);

      expect(result).toEqual({ success: true, data: 7 });
      expect(terminal.output).toBe(
        'Enter grade: Invalid input. Please try again.\n' +
        'Enter grade: Invalid input. Please try again.\n' +
        'Enter grade: '
      );
    });

    test('同じ行に残った値は次のプロンプトで使われる', async () => {
      const terminal = new ScriptedConsole(['8 3']);
      const validator = new InputValidator(terminal, terminal);

      const grade = await validator.promptNumber('grade: ', GRADE_BOUNDS);
      const credit = await validator.promptNumber('credit: ', GRADE_BOUNDS);

      expect(grade).toEqual({ success: true, data: 8 });
      expect(credit).toEqual({ success: true, data: 3 });
      expect(terminal.remainingInput).toBe(0);
    });

    test('不正な値の後の同じ行の残りは捨てる', async () => {
      const terminal = new ScriptedConsole(['abc 5', '6']);
      const validator = new InputValidator(terminal, terminal);

      const result = await validator.promptNumber('value: ', GRADE_BOUNDS);

      expect(result).toEqual({ success: true, data: 6 });
    });

    test('空行は読み飛ばし、プロンプトは繰り返さない', async () => {
      const terminal = new ScriptedConsole(['', '   ', '4']);
      const validator = new InputValidator(terminal, terminal);

      const result = await validator.promptNumber('value: ', GRADE_BOUNDS);

      expect(result).toEqual({ success: true, data: 4 });
      expect(terminal.output).toBe('value: ');
    });

    test('入力が終われば InputClosedError', async () => {
      const terminal = new ScriptedConsole(['abc']);
      const validator = new InputValidator(terminal, terminal);

      const result = await validator.promptNumber('value: ', GRADE_BOUNDS);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe('InputClosedError');
      }
    });
  });
});

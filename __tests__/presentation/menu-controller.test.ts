import { describe, test, expect, beforeEach } from 'vitest';
import { MenuController, MENU_PROMPT } from '../../src/contexts/grading/presentation/menu-controller.js';
import { InputValidator } from '../../src/contexts/grading/presentation/input-validator.js';
import { GradeBookService } from '../../src/contexts/grading/application/index.js';
import { InMemoryGradeBookRepository } from '../../src/contexts/grading/infrastructure/repositories/in-memory-grade-book-repository.js';
import { setConfigForTesting, MINIMAL_CONFIG } from '../../src/shared/config/index.js';
import { ScriptedConsole } from '../helpers/scripted-console.js';

const PATH = 'menu.txt';

describe('MenuController', () => {
  let repository: InMemoryGradeBookRepository;

  beforeEach(() => {
    setConfigForTesting(MINIMAL_CONFIG);
    repository = new InMemoryGradeBookRepository();
  });

  const runSession = async (inputLines: string[]) => {
    const terminal = new ScriptedConsole(inputLines);
    const service = new GradeBookService(repository, terminal, { dataFilePath: PATH });
    const menu = new MenuController(
      service,
      new InputValidator(terminal, terminal),
      terminal,
      MINIMAL_CONFIG.input
    );
    await menu.run();
    return { terminal, service };
  };

  test('学期を追加して表示・保存し、終了する', async () => {
    const { terminal, service } = await runSession(['1', '2', '8 3', '6', '2', '2', '3', '5']);

    expect(service.getStudent().semesters).toHaveLength(1);
    expect(terminal.outputLines).toContain('GPA: 7.20');
    expect(terminal.outputLines).toContain('Final CGPA: 7.20');
    expect(terminal.outputLines).toContain(`${MENU_PROMPT}Data saved successfully.`);
    expect(terminal.outputLines.slice(-2)).toEqual([`${MENU_PROMPT}Exiting program.`, '']);
    expect(repository.getFileContent(PATH)).toBe('2\n8 3\n6 2\n');
  });

  test('科目入力のプロンプト', async () => {
    const { terminal } = await runSession(['1', '1', '9', '4', '5']);

    expect(terminal.output).toContain(
      'Enter number of courses: Enter numeric grade (0–10): Enter credit hours (>0): '
    );
  });

  test('メニューは5つの選択肢を表示する', async () => {
    const { terminal } = await runSession(['5']);

    expect(terminal.output).toBe([
      '',
      '--- CGPA CALCULATOR MENU ---',
      '1. Add Semester',
      '2. Display Result',
      '3. Save to File',
      '4. Load from File',
      '5. Exit',
      'Enter choice: Exiting program.',
      ''
    ].join('\n'));
  });

  test('範囲外の選択肢は再入力させる', async () => {
    const { terminal } = await runSession(['9', '5']);

    expect(terminal.outputLines).toContain(`${MENU_PROMPT}Invalid input. Please try again.`);
    expect(terminal.outputLines).toContain('Exiting program.');
  });

  test('範囲外の成績や単位数は再入力させる', async () => {
    const { service } = await runSession(['1', '1', '12', '9', '0', '4', '5']);

    expect(service.getStudent()).toEqual({ semesters: [{ courses: [{ grade: 9, credit: 4 }] }] });
  });

  test('読み込んだデータを表示する', async () => {
    repository.setFileContent(PATH, '1\n9 4\n');

    const { terminal } = await runSession(['4', '2', '5']);

    expect(terminal.outputLines).toContain(`${MENU_PROMPT}Data loaded successfully.`);
    expect(terminal.outputLines).toContain('Final CGPA: 9.00');
  });

  test('入力が終われば学期を追加せずにループを抜ける', async () => {
    const { terminal, service } = await runSession(['1', '2', '8', '3']);

    expect(service.getStudent().semesters).toEqual([]);
    expect(terminal.output).not.toContain('Exiting program.');
  });
});

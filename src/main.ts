#!/usr/bin/env node
import { ConfigLoader, DEFAULT_GRADE_BOOK_CONFIG } from './shared/config/index.js';
import { createLogger } from './shared/logging/logger.js';
import { GradeBookService } from './contexts/grading/application/index.js';
import { FileGradeBookRepository } from './contexts/grading/infrastructure/repositories/file-grade-book-repository.js';
import { NodeConsole } from './contexts/grading/infrastructure/console/node-console.js';
import { InputValidator } from './contexts/grading/presentation/input-validator.js';
import { MenuController } from './contexts/grading/presentation/menu-controller.js';

const logger = createLogger('main');

/**
 * エントリポイント: 設定を読み、依存を組み立ててメニューを回す
 *
 * 終了コードは常に0
 */
async function main(): Promise<void> {
  const loader = ConfigLoader.getInstance();
  const configResult = loader.load();
  const config = configResult.success ? configResult.config : DEFAULT_GRADE_BOOK_CONFIG;
  if (!configResult.success) {
    loader.setCached(DEFAULT_GRADE_BOOK_CONFIG);
    logger.warn('Invalid configuration, using defaults', { issues: configResult.error.issues });
  }

  const terminal = new NodeConsole();
  const service = new GradeBookService(new FileGradeBookRepository(), terminal);
  const menu = new MenuController(service, new InputValidator(terminal, terminal), terminal, config.input);

  try {
    await menu.run();
  } finally {
    terminal.close();
  }
}

main().then(
  () => {
    process.exitCode = 0;
  },
  (error: unknown) => {
    logger.error('Unexpected failure', { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 0;
  }
);

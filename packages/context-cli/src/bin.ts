#!/usr/bin/env -S node --import tsx
import { createConsolePresenter } from './cli/presenter.js';
import { createProgram } from './cli/index.js';

const program = createProgram(
  { cwd: process.cwd(), presenter: createConsolePresenter() },
  {
    onExit: (code) => {
      process.exitCode = code;
    },
  }
);

await program.parseAsync(process.argv);

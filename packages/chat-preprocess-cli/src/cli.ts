#!/usr/bin/env node
import { runPreprocessCli } from './index';

runPreprocessCli()
  .then((summary) => {
    if (summary.failed > 0) {
      process.exitCode = 1;
    }
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });

/**
 * Distillation - categorize and summarize every unprocessed item
 *
 * Usage:
 *   npm run distill
 */

import 'dotenv/config';
import { runDistillation } from '../lib/orchestrator';

runDistillation()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error(error);
    process.exitCode = 1;
  });

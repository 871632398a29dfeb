/**
 * Synthesis - fold the eligible backlog into one report and audio file
 *
 * Usage:
 *   npm run synthesize
 */

import 'dotenv/config';
import { runSynthesis } from '../lib/orchestrator';

runSynthesis()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error(error);
    process.exitCode = 1;
  });

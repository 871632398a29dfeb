/**
 * Ingestion - collect new items from every registered source
 *
 * Usage:
 *   npm run ingest
 */

import 'dotenv/config';
import { runIngestion } from '../lib/orchestrator';

runIngestion()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error(error);
    process.exitCode = 1;
  });

/**
 * Apply pending schema migrations to the item store
 *
 * Usage:
 *   npm run migrate
 */

import 'dotenv/config';
import { runMigrate } from '../lib/orchestrator';

process.exitCode = runMigrate();

/**
 * League Stats Sync - Main Entry Point
 *
 * Runs one incremental update of the league's player, game and averages
 * tables and exits. Intended to be invoked on a schedule (e.g. cron).
 */

import { startApp } from './services/app.js';

if (!(await startApp(process.env))) {
  process.exitCode = 1;
}

/**
 * Error Logger - Write detailed error logs to files for debugging
 */

import { writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { formatError, isTransferError } from './errors.js';
import { LOGS_DIR } from './constants.js';

/**
 * Context recorded alongside an error. Never put passwords here.
 */
export interface ErrorLogContext {
  operation?: string;
  command?: string;
  inputPath?: string;
  outputPath?: string;
  additionalInfo?: Record<string, unknown>;
}

/**
 * Ensure logs directory exists
 */
async function ensureLogsDir(baseDir: string): Promise<string> {
  const logsDir = join(baseDir, LOGS_DIR);
  await mkdir(logsDir, { recursive: true });
  return logsDir;
}

/**
 * Generate timestamp for log filename
 */
function getTimestamp(): string {
  const now = new Date();
  return now.toISOString().replace(/[:.]/g, '-').slice(0, -5); // 2026-01-02T19-30-45
}

/**
 * Write detailed error log to file
 *
 * @param error - The error that occurred
 * @param context - Additional context about what was happening
 * @param baseDir - Directory the logs folder is created in
 * @returns Path to the log file
 */
export async function logError(
  error: unknown,
  context: ErrorLogContext = {},
  baseDir: string = process.cwd()
): Promise<string> {
  const logsDir = await ensureLogsDir(baseDir);
  const logFile = join(logsDir, `transfer-error-${getTimestamp()}.log`);

  const logContent = [
    '='.repeat(70),
    `TRANSFER ERROR LOG`,
    `Timestamp: ${new Date().toISOString()}`,
    '='.repeat(70),
    '',
    '## Error Details',
    '-'.repeat(70),
    `Message: ${formatError(error)}`,
    isTransferError(error) ? `Code: ${error.code}` : 'Code: UNEXPECTED',
    '',
    error instanceof Error && error.stack
      ? `Stack Trace:\n${error.stack}`
      : 'No stack trace available',
    '',
  ];

  if (context.operation || context.command) {
    logContent.push('## Operation Context', '-'.repeat(70));
    if (context.command) logContent.push(`Command: ${context.command}`);
    if (context.operation) logContent.push(`Operation: ${context.operation}`);
    logContent.push('');
  }

  if (context.inputPath || context.outputPath) {
    logContent.push('## Paths', '-'.repeat(70));
    if (context.inputPath) logContent.push(`Input: ${context.inputPath}`);
    if (context.outputPath) logContent.push(`Output: ${context.outputPath}`);
    logContent.push('');
  }

  if (context.additionalInfo) {
    logContent.push(
      '## Additional Information',
      '-'.repeat(70),
      JSON.stringify(context.additionalInfo, null, 2),
      ''
    );
  }

  logContent.push(
    '## Environment',
    '-'.repeat(70),
    `Node: ${process.version}`,
    `Platform: ${process.platform} ${process.arch}`,
    `CWD: ${process.cwd()}`,
    ''
  );

  logContent.push('='.repeat(70), `End of error log`, '='.repeat(70));

  await writeFile(logFile, logContent.join('\n'), 'utf-8');
  return logFile;
}

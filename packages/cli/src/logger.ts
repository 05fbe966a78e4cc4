/**
 * Debug logger for the reposeed CLI
 *
 * Appends to .reposeed/debug.log in the working directory when that directory
 * exists, otherwise to ~/.reposeed/debug.log. REPOSEED_LOG_FILE overrides both.
 * Registered secrets are masked before anything is written.
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';
import { CommandError, ProvisionError, redactSecrets } from '@reposeed/core';

const REPOSEED_DIR = '.reposeed';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

let logFilePath: string | null = null;
let sessionStarted = false;
const secrets: string[] = [];

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG' | 'CMD' | 'STDOUT' | 'STDERR';

/**
 * Get the debug log file path
 */
export function getLogPath(): string {
  if (!logFilePath) {
    const fromEnv = process.env.REPOSEED_LOG_FILE;
    const localDir = path.join(process.cwd(), REPOSEED_DIR);
    const homeDir = path.join(homedir(), REPOSEED_DIR);

    if (fromEnv) {
      logFilePath = path.resolve(fromEnv);
    } else if (fs.existsSync(localDir)) {
      logFilePath = path.join(localDir, DEBUG_LOG_FILE);
    } else {
      fs.mkdirSync(homeDir, { recursive: true });
      logFilePath = path.join(homeDir, DEBUG_LOG_FILE);
    }
  }
  return logFilePath;
}

/**
 * Mask a value (such as an access token) in every later log entry
 */
export function registerSecret(secret: string): void {
  if (secret && !secrets.includes(secret)) {
    secrets.push(secret);
  }
}

function rotateIfLarge(logPath: string): void {
  if (!fs.existsSync(logPath) || fs.statSync(logPath).size <= MAX_LOG_SIZE) {
    return;
  }
  const backupPath = logPath + '.old';
  fs.rmSync(backupPath, { force: true });
  fs.renameSync(logPath, backupPath);
}

function initSession(): void {
  if (sessionStarted) return;
  sessionStarted = true;

  const logPath = getLogPath();
  rotateIfLarge(logPath);

  const separator = '='.repeat(80);
  fs.appendFileSync(
    logPath,
    `\n${separator}\n[${new Date().toISOString()}] reposeed CLI Session Started\n${separator}\n`
  );
}

function describeData(data: unknown): string {
  if (data instanceof Error) {
    return `\n  Error: ${data.message}` + (data.stack ? `\n  Stack: ${data.stack}` : '');
  }
  if (typeof data === 'object' && data !== null) {
    return `\n  Data: ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`;
  }
  return `\n  Data: ${String(data)}`;
}

/**
 * Format a log entry
 */
export function formatEntry(level: LogLevel, message: string, data?: unknown, timestamp = new Date()): string {
  let entry = `[${timestamp.toISOString()}] [${level}] ${message}`;
  if (data !== undefined) {
    entry += describeData(data);
  }
  return redactSecrets(entry, secrets) + '\n';
}

function writeLog(level: LogLevel, message: string, data?: unknown): void {
  try {
    initSession();
    fs.appendFileSync(getLogPath(), formatEntry(level, message, data));
  } catch (error) {
    // The debug log never decides the outcome of a command
    if (process.env.REPOSEED_DEBUG) {
      console.error(`reposeed: could not write debug log: ${String(error)}`);
    }
  }
}

export function logInfo(message: string, data?: unknown): void {
  writeLog('INFO', message, data);
}

export function logWarn(message: string, data?: unknown): void {
  writeLog('WARN', message, data);
}

export function logError(message: string, data?: unknown): void {
  writeLog('ERROR', message, data);
}

export function logDebug(message: string, data?: unknown): void {
  writeLog('DEBUG', message, data);
}

/**
 * Log a spawned vendor command (already redacted by the runner)
 */
export function logCommand(commandLine: string, cwd?: string): void {
  writeLog('CMD', `Executing: ${commandLine}`, cwd ? { cwd } : undefined);
}

/**
 * Log command output (stdout/stderr)
 */
export function logOutput(stream: 'stdout' | 'stderr', output: string): void {
  if (output.trim()) {
    writeLog(stream === 'stdout' ? 'STDOUT' : 'STDERR', output.trim());
  }
}

/**
 * Structured fields for an error, including the failed step and sub-command
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { rawError: String(error) };
  }

  const fields: Record<string, unknown> = {
    errorName: error.name,
    errorMessage: error.message,
    errorStack: error.stack,
  };
  if (error instanceof ProvisionError) {
    fields.step = error.step;
    fields.exitCode = error.exitCode;
  }
  const command = error instanceof CommandError ? error : error.cause;
  if (command instanceof CommandError) {
    fields.commandLine = command.commandLine;
    fields.commandExitCode = command.exitCode;
    fields.stderr = command.stderr;
  }
  return fields;
}

/**
 * Log a full error with context for debugging
 */
export function logFullError(
  context: string,
  error: unknown,
  additionalData?: Record<string, unknown>
): void {
  writeLog('ERROR', `Error in ${context}`, { context, ...additionalData, ...describeError(error) });
}

export interface CommandLogger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
}

/**
 * Create a logger for a specific command
 */
export function createCommandLogger(commandName: string): CommandLogger {
  return {
    info: (message, data) => logInfo(`[${commandName}] ${message}`, data),
    warn: (message, data) => logWarn(`[${commandName}] ${message}`, data),
    error: (message, data) => logError(`[${commandName}] ${message}`, data),
    debug: (message, data) => logDebug(`[${commandName}] ${message}`, data),
  };
}

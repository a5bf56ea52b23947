import { logger } from './logger.js';

const log = logger.createContext('error-handlers');

/**
 * Install process-level handlers so a browser that dies mid-render does not
 * take the whole batch down. Call once from the CLI entry point.
 */
export function installGlobalErrorHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    const message = errorMessage(reason);
    if (isBrowserError(message)) {
      log.error('Unhandled browser error (non-fatal):', message);
      return;
    }
    log.error('Unhandled Promise Rejection:', reason);
  });

  process.on('uncaughtException', (err: Error, origin: string) => {
    if (isBrowserError(err.message)) {
      log.error('Uncaught browser error (non-fatal):', err.message);
      return;
    }

    log.error('FATAL: Uncaught Exception:', err);
    log.error('Origin:', origin);
    process.exit(1);
  });

  log.debug('Global error handlers installed');
}

/**
 * Check if an error is related to browser/page being closed.
 * Sessions hit by these are discarded instead of being returned to the pool.
 */
export function isBrowserError(message: string | null | undefined): boolean {
  if (!message) return false;

  const lowerMessage = message.toLowerCase();
  return lowerMessage.includes('target page, context or browser has been closed') ||
         lowerMessage.includes('browser has been closed') ||
         lowerMessage.includes('context has been closed') ||
         lowerMessage.includes('target closed') ||
         lowerMessage.includes('websocket') ||
         lowerMessage.includes('disconnected') ||
         lowerMessage.includes('connection closed') ||
         lowerMessage.includes('browser is closed') ||
         lowerMessage.includes('execution context was destroyed') ||
         lowerMessage.includes('page has been closed') ||
         lowerMessage.includes('page crashed');
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Optional logger accepted by the streaming entry points.
 *
 * The engine never prints; callers that want progress or diagnostics pass
 * an adapter over their own logger.
 */
export interface DiffLogger {
  debug?: (message: string, details?: Record<string, unknown>) => void;
  info?: (message: string, details?: Record<string, unknown>) => void;
  warn?: (message: string, details?: Record<string, unknown>) => void;
  error?: (message: string, details?: Record<string, unknown>) => void;
}

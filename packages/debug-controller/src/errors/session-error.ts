import type { SessionPhase } from '../types/index.js';

/**
 * Failure kinds of the session controller
 */
export enum SessionErrorCode {
  NO_ACTIVE_DOCUMENT = 'no_active_document',
  LINK_ERROR = 'link_error',
  INVALID_TRANSITION = 'invalid_transition',
  PROCESS_LAUNCH_FAILURE = 'process_launch_failure',
}

const RECOVERABLE_CODES: ReadonlySet<SessionErrorCode> = new Set([
  SessionErrorCode.NO_ACTIVE_DOCUMENT,
  SessionErrorCode.INVALID_TRANSITION,
]);

/**
 * Session error carrying its kind.
 *
 * `recoverable` errors are logged and absorbed by the controller; the others
 * are shown to the user and end the session.
 */
export class SessionError extends Error {
  public readonly code: SessionErrorCode;
  public readonly recoverable: boolean;
  public readonly cause?: Error;

  public constructor(message: string, code: SessionErrorCode, cause?: Error) {
    super(message);
    this.name = 'SessionError';
    this.code = code;
    this.recoverable = RECOVERABLE_CODES.has(code);
    this.cause = cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, SessionError.prototype);
  }

  /**
   * Convert the error to a JSON representation for the event log
   * @returns JSON object containing error details
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      recoverable: this.recoverable,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  public static noActiveDocument(): SessionError {
    return new SessionError(
      'There is no active document to debug.',
      SessionErrorCode.NO_ACTIVE_DOCUMENT,
    );
  }

  public static linkError(m: string, c?: Error): SessionError {
    return new SessionError(`Debugger link error: ${m}`, SessionErrorCode.LINK_ERROR, c);
  }

  public static invalidTransition(action: string, phase: SessionPhase): SessionError {
    return new SessionError(
      `Cannot ${action} while the session is ${phase}.`,
      SessionErrorCode.INVALID_TRANSITION,
    );
  }

  public static processLaunchFailure(script: string, c?: Error): SessionError {
    const reason = c ? `: ${c.message}` : '';
    return new SessionError(
      `Could not start ${script}${reason}`,
      SessionErrorCode.PROCESS_LAUNCH_FAILURE,
      c,
    );
  }

  /**
   * Wraps whatever a link request threw into a link error.
   */
  public static fromLinkFailure(error: unknown): SessionError {
    if (isSessionError(error)) {
      return error;
    }
    if (error instanceof Error) {
      return SessionError.linkError(error.message, error);
    }
    return SessionError.linkError(String(error));
  }
}

export function isSessionError(error: unknown): error is SessionError {
  return error instanceof SessionError;
}

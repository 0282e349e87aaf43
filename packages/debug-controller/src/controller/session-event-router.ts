import type { BreakpointRef, DebugLinkEvent, StackSnapshot } from '../types/index.js';

/**
 * One handler per link event. Handlers may be asynchronous; the router
 * hands back whatever they return so the caller can keep dispatch serial.
 */
export interface DebugLinkEventHandlers {
  onBootstrap(): Promise<void> | void;
  onLine(file: string, line: number): Promise<void> | void;
  onStack(frames: StackSnapshot): Promise<void> | void;
  onBreakpointEnable(breakpoint: BreakpointRef): Promise<void> | void;
  onBreakpointDisable(breakpoint: BreakpointRef): Promise<void> | void;
  onBreakpointIgnore(breakpoint: BreakpointRef, count: number): Promise<void> | void;
  onBreakpointClear(breakpoint: BreakpointRef): Promise<void> | void;
  onInfo(message: string): Promise<void> | void;
  onWarning(message: string): Promise<void> | void;
  onError(message: string): Promise<void> | void;
  onPostmortem(context: unknown): Promise<void> | void;
  onRestart(): Promise<void> | void;
  onCall(args: unknown): Promise<void> | void;
  onReturn(value: unknown): Promise<void> | void;
  onException(name: string, value: string): Promise<void> | void;
}

/**
 * Routes a link event to its handler.
 */
export function routeLinkEvent(
  event: DebugLinkEvent,
  handlers: DebugLinkEventHandlers,
): Promise<void> | void {
  switch (event.type) {
    case 'bootstrap':
      return handlers.onBootstrap();
    case 'line':
      return handlers.onLine(event.file, event.line);
    case 'stack':
      return handlers.onStack(event.frames);
    case 'breakpoint-enable':
      return handlers.onBreakpointEnable(event.breakpoint);
    case 'breakpoint-disable':
      return handlers.onBreakpointDisable(event.breakpoint);
    case 'breakpoint-ignore':
      return handlers.onBreakpointIgnore(event.breakpoint, event.count);
    case 'breakpoint-clear':
      return handlers.onBreakpointClear(event.breakpoint);
    case 'info':
      return handlers.onInfo(event.message);
    case 'warning':
      return handlers.onWarning(event.message);
    case 'error':
      return handlers.onError(event.message);
    case 'postmortem':
      return handlers.onPostmortem(event.context);
    case 'restart':
      return handlers.onRestart();
    case 'call':
      return handlers.onCall(event.args);
    case 'return':
      return handlers.onReturn(event.value);
    case 'exception':
      return handlers.onException(event.name, event.value);
    default: {
      const unhandled: never = event;
      throw new Error(`Unsupported link event: ${JSON.stringify(unhandled)}`);
    }
  }
}

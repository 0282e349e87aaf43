import path from 'node:path';
import Emittery from 'emittery';
import { createScopedLogger, logEvent, logError, type ILogger } from '@stepwise/core';
import {
  ControllerConfigSchema,
  type ControllerConfig,
  type ControllerConfigInput,
} from '@stepwise/schemas';

import type {
  ActionDescriptor,
  Breakpoint,
  BreakpointChange,
  BreakpointRef,
  CommandAcknowledgment,
  CommandName,
  DebugLink,
  DebugLinkEvent,
  DebugLinkFactory,
  DebugMode,
  DocumentSource,
  ModeHost,
  PhaseChange,
  ProcessExit,
  ProcessHandle,
  ProcessHandleFactory,
  SessionPhase,
  StackSnapshot,
  UiSink,
} from '../types/index.js';
import { BreakpointStore } from '../breakpoints/breakpoint-store.js';
import { SessionError, SessionErrorCode, isSessionError } from '../errors/session-error.js';
import { createChildProcessFactory } from '../process/child-process-handle.js';
import { DEBUG_ACTIONS, isActionName } from './actions.js';
import { toLinkLine, toUiLine } from './coordinates.js';
import { DispatchQueue } from './dispatch-queue.js';
import { routeLinkEvent, type DebugLinkEventHandlers } from './session-event-router.js';
import { canTransition, isLinkReady } from './session-phase.js';
import { statusMessages } from './status-messages.js';

export interface SessionControllerEvents {
  phase: PhaseChange;
  breakpoints: BreakpointChange;
}

export interface SessionControllerDependencies {
  ui: UiSink;
  documents: DocumentSource;
  createLink: DebugLinkFactory;
  /** Defaults to launching the configured interpreter through execa. */
  createProcess?: ProcessHandleFactory;
  host?: ModeHost;
  config?: ControllerConfigInput;
  logger?: ILogger;
  store?: BreakpointStore;
}

export interface ExecutionPosition {
  file: string;
  /** 0-based, editor coordinates */
  line: number;
}

interface ActiveSession {
  script: string;
  debuggee: ProcessHandle;
  link?: DebugLink;
  unsubscribe: Array<() => void>;
}

const COMMAND_LABELS: Record<CommandName, string> = {
  run: 'continue',
  stepOver: 'step over',
  stepInto: 'step into',
  stepReturn: 'step out',
};

/**
 * Owns one debug session at a time: its phase, the breakpoints of every open
 * file and the markers shown for them.
 *
 * Every public command and every inbound link or process event runs through
 * a single dispatch queue, so handlers never interleave. Nothing here waits
 * for a debuggee reply; results come back as later events.
 */
export class SessionController implements DebugMode {
  public readonly name = 'Graphical Debugger';
  public readonly description = 'Debug your Python 3 code.';
  public readonly icon = 'python';
  public readonly isDebugger = true;

  public readonly events = new Emittery<SessionControllerEvents>();

  private readonly ui: UiSink;
  private readonly documents: DocumentSource;
  private readonly createLink: DebugLinkFactory;
  private readonly createProcess: ProcessHandleFactory;
  private readonly host?: ModeHost;
  private readonly config: ControllerConfig;
  private readonly logger: ILogger;
  private readonly store: BreakpointStore;

  private readonly queue = new DispatchQueue();
  private readonly openFiles = new Set<string>();
  // 0-based editor lines currently showing a breakpoint marker
  private readonly markers = new Map<string, Set<number>>();
  private readonly unsubscribeStore: () => void;

  private phase: SessionPhase = 'idle';
  private session: ActiveSession | null = null;
  private position: ExecutionPosition | null = null;
  // inspector shown and editor read-only, possibly left over from a finished run
  private affordancesApplied = false;

  private readonly linkHandlers: DebugLinkEventHandlers = {
    onBootstrap: () => this.handleBootstrap(),
    onLine: (file, line) => this.handleLine(file, line),
    onStack: (frames) => this.handleStack(frames),
    onBreakpointEnable: (breakpoint) => this.handleBreakpointEnable(breakpoint),
    onBreakpointDisable: (breakpoint) => this.handleBreakpointDisable(breakpoint),
    onBreakpointIgnore: (breakpoint, count) =>
      this.ignoreEvent('breakpoint-ignore', { ...breakpoint, count }),
    onBreakpointClear: (breakpoint) => this.ignoreEvent('breakpoint-clear', { ...breakpoint }),
    onInfo: (message) => this.ui.showStatus(statusMessages.info(message)),
    onWarning: (message) => this.ui.showStatus(statusMessages.warning(message)),
    onError: (message) => this.ui.showStatus(statusMessages.error(message)),
    onPostmortem: (context) => this.handlePostmortem(context),
    onRestart: () => this.ignoreEvent('restart', {}),
    onCall: (args) => this.ignoreEvent('call', { args }),
    onReturn: (value) => this.ignoreEvent('return', { value }),
    onException: (name, value) => this.ignoreEvent('exception', { name, value }),
  };

  public constructor(dependencies: SessionControllerDependencies) {
    this.ui = dependencies.ui;
    this.documents = dependencies.documents;
    this.createLink = dependencies.createLink;
    this.host = dependencies.host;
    this.config = ControllerConfigSchema.parse(dependencies.config ?? {});
    this.createProcess = dependencies.createProcess ?? createChildProcessFactory(this.config);
    this.logger = dependencies.logger ?? createScopedLogger('session-controller');
    this.store = dependencies.store ?? new BreakpointStore();

    this.unsubscribeStore = this.store.events.on('change', (change) =>
      this.events.emit('breakpoints', change),
    );
  }

  // ---------------------------------------------------------------------------
  // Read-only views
  // ---------------------------------------------------------------------------

  public getPhase(): SessionPhase {
    return this.phase;
  }

  public getPosition(): ExecutionPosition | null {
    return this.position ? { ...this.position } : null;
  }

  public getOpenFiles(): string[] {
    return [...this.openFiles];
  }

  public breakpointsFor(file: string): ReadonlyMap<number, Readonly<Breakpoint>> {
    return this.store.allFor(file);
  }

  /** 0-based lines showing a marker, ascending. */
  public markersFor(file: string): number[] {
    return [...(this.markers.get(file) ?? [])].sort((a, b) => a - b);
  }

  public actions(): readonly ActionDescriptor[] {
    return DEBUG_ACTIONS;
  }

  /** Resolves once every command and event received so far is handled. */
  public settled(): Promise<void> {
    return this.queue.drain();
  }

  // ---------------------------------------------------------------------------
  // Commands
  // ---------------------------------------------------------------------------

  public start(): Promise<void> {
    return this.queue.enqueue(() => this.guard('start', () => this.startSession()));
  }

  public stop(): Promise<void> {
    return this.queue.enqueue(() => this.guard('stop', () => this.teardown()));
  }

  public run(): Promise<CommandAcknowledgment> {
    return this.command('run', ['running', 'paused'], (link) => link.run());
  }

  public stepOver(): Promise<CommandAcknowledgment> {
    return this.command('stepOver', ['paused'], (link) => link.stepOver());
  }

  public stepInto(): Promise<CommandAcknowledgment> {
    return this.command('stepInto', ['paused'], (link) => link.stepInto());
  }

  public stepReturn(): Promise<CommandAcknowledgment> {
    return this.command('stepReturn', ['paused'], (link) => link.stepReturn());
  }

  /**
   * Toggles the breakpoint at a 0-based editor line. Valid in every phase.
   */
  public toggleBreakpoint(file: string, line: number): Promise<void> {
    return this.queue.enqueue(() =>
      this.guard('toggle breakpoint', () => this.toggle(file, line)),
    );
  }

  public openFile(file: string): Promise<void> {
    return this.queue.enqueue(() => {
      this.openFiles.add(file);
    });
  }

  /** Forgets the file's breakpoints and markers. */
  public closeFile(file: string): Promise<void> {
    return this.queue.enqueue(() => {
      this.openFiles.delete(file);
      this.markers.delete(file);
      this.store.dropFile(file);
    });
  }

  public async handleAction(name: string): Promise<void> {
    if (!isActionName(name)) {
      this.logger.warn(`Unknown debugger action: ${name}`);
      return;
    }
    switch (name) {
      case 'stop':
        await this.stop();
        return;
      case 'run':
        await this.run();
        return;
      case 'step-over':
        await this.stepOver();
        return;
      case 'step-in':
        await this.stepInto();
        return;
      case 'step-out':
        await this.stepReturn();
        return;
    }
  }

  /** Stops any session and detaches every listener. */
  public async dispose(): Promise<void> {
    await this.stop();
    this.unsubscribeStore();
    this.events.clearListeners();
  }

  // ---------------------------------------------------------------------------
  // Session lifecycle
  // ---------------------------------------------------------------------------

  private async startSession(): Promise<void> {
    if (this.phase !== 'idle') {
      throw SessionError.invalidTransition('start a session', this.phase);
    }

    const script = await this.resolveScript();
    if (!script) {
      this.logger.info('Current script has not been saved. Aborting debug.');
      await this.teardown();
      return;
    }

    this.openFiles.add(script);
    this.ui.showStatus(statusMessages.running(script));
    this.logger.debug('Running / debugging script', { script });

    const debuggee = this.createProcess({
      script,
      workspaceDir: this.config.workspaceDir ?? path.dirname(script),
    });
    const session: ActiveSession = { script, debuggee, unsubscribe: [] };
    this.session = session;
    session.unsubscribe.push(
      debuggee.onFinished((exit) => this.dispatchProcessExit(session, exit)),
    );
    this.transition('starting');

    try {
      await debuggee.start();
      await debuggee.waitForStart();
    } catch (error) {
      throw SessionError.processLaunchFailure(
        script,
        error instanceof Error ? error : new Error(String(error)),
      );
    }

    if (!this.affordancesApplied) {
      this.ui.showInspector();
      this.ui.setReadOnly(true);
      this.affordancesApplied = true;
    }
    for (const action of DEBUG_ACTIONS) {
      this.ui.enableAction(action.name, true);
    }

    const link = this.createLink({
      host: this.config.debuggerHost,
      port: this.config.debuggerPort,
      process: debuggee,
    });
    session.link = link;
    session.unsubscribe.push(link.onEvent((event) => this.dispatchLinkEvent(session, event)));

    // Not awaited here; a failure comes back through the queue
    void link.open().catch((error: unknown) => this.dispatchLinkFailure(session, error));
  }

  private async resolveScript(): Promise<string | null> {
    const document = this.documents.currentDocument();
    if (!document) {
      throw SessionError.noActiveDocument();
    }
    if (document.path !== null && !document.modified) {
      return document.path;
    }
    return this.documents.save(document);
  }

  /**
   * Ends the session: the process is killed and waited for before the phase
   * reaches idle. In idle this only clears what a finished run left behind.
   */
  private async teardown(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session) {
      this.logger.debug('Stopping debugger', { script: session.script });
      await this.release(session, { kill: true });
    }
    this.position = null;
    this.restoreAffordances();
    if (this.phase !== 'idle') {
      this.transition('idle');
    }
  }

  private async release(session: ActiveSession, { kill }: { kill: boolean }): Promise<void> {
    for (const unsubscribe of session.unsubscribe.splice(0)) {
      unsubscribe();
    }
    if (kill) {
      try {
        session.debuggee.kill();
      } catch (error) {
        this.logger.warn('Failed to kill the debuggee', { error: summarize(error) });
      }
    }
    try {
      await session.debuggee.waitForFinish();
    } catch (error) {
      this.logger.warn('Failed waiting for the debuggee to exit', { error: summarize(error) });
    }
    if (session.link) {
      try {
        await session.link.close();
      } catch (error) {
        this.logger.warn('Failed to close the debug link', { error: summarize(error) });
      }
    }
  }

  private restoreAffordances(): void {
    if (!this.affordancesApplied) return;
    this.affordancesApplied = false;
    this.ui.removeInspector();
    this.ui.setReadOnly(false);
    this.host?.changeMode(this.config.fallbackMode);
  }

  private async handleProcessFinished(session: ActiveSession, exit: ProcessExit): Promise<void> {
    if (this.session !== session) return;
    this.logger.info('Debuggee finished', { exitCode: exit.exitCode, status: exit.status });

    this.transition('finished');
    for (const action of DEBUG_ACTIONS) {
      if (action.name !== 'stop') {
        this.ui.enableAction(action.name, false);
      }
    }
    this.ui.showStatus(statusMessages.finished());
    this.resyncMarkers();

    this.session = null;
    await this.release(session, { kill: false });
    this.transition('idle');
  }

  /** Rebuilds every open file's markers from the store. */
  private resyncMarkers(): void {
    for (const file of this.openFiles) {
      this.ui.clearAllMarkers(file);
      this.ui.clearSelection(file);
      const lines = new Set<number>();
      for (const breakpoint of this.store.enabledFor(file)) {
        const uiLine = toUiLine(breakpoint.line);
        lines.add(uiLine);
        this.ui.setMarker(file, uiLine);
      }
      this.markers.set(file, lines);
    }
    this.position = null;
  }

  // ---------------------------------------------------------------------------
  // Commands and breakpoints
  // ---------------------------------------------------------------------------

  private command(
    command: CommandName,
    validIn: readonly SessionPhase[],
    request: (link: DebugLink) => Promise<void>,
  ): Promise<CommandAcknowledgment> {
    return this.queue.enqueue(async () => {
      let sent = false;
      await this.guard(command, async () => {
        if (!validIn.includes(this.phase)) {
          throw SessionError.invalidTransition(COMMAND_LABELS[command], this.phase);
        }
        await this.send(request);
        sent = true;
        if (this.phase === 'paused') {
          this.transition('running');
        }
      });
      return { command, sent };
    });
  }

  private async toggle(file: string, uiLine: number): Promise<void> {
    if (!Number.isInteger(uiLine) || uiLine < 0) {
      this.logger.warn('Ignoring breakpoint toggle at an invalid line', { file, line: uiLine });
      return;
    }
    const line = toLinkLine(uiLine);
    const linkReady = isLinkReady(this.phase);
    this.openFiles.add(file);

    if (this.hasMarker(file, uiLine)) {
      const breakpoint = this.store.get(file, line);
      this.removeMarker(file, uiLine);
      if (breakpoint) {
        this.store.disable(breakpoint);
        if (linkReady) {
          await this.send((link) => link.disableBreakpoint(breakpoint));
        }
      }
      return;
    }

    this.addMarker(file, uiLine);
    const existing = this.store.get(file, line);
    if (existing) {
      this.store.enable(existing);
      if (linkReady) {
        await this.send((link) => link.enableBreakpoint(existing));
      }
    } else {
      this.store.create(file, line);
      if (linkReady) {
        await this.send((link) => link.setBreakpoint(file, line));
      }
    }
  }

  private hasMarker(file: string, uiLine: number): boolean {
    return this.markers.get(file)?.has(uiLine) ?? false;
  }

  private addMarker(file: string, uiLine: number): void {
    let lines = this.markers.get(file);
    if (!lines) {
      lines = new Set();
      this.markers.set(file, lines);
    }
    if (lines.has(uiLine)) return;
    lines.add(uiLine);
    this.ui.setMarker(file, uiLine);
  }

  private removeMarker(file: string, uiLine: number): void {
    const lines = this.markers.get(file);
    if (!lines?.delete(uiLine)) return;
    this.ui.clearMarker(file, uiLine);
  }

  // ---------------------------------------------------------------------------
  // Link events
  // ---------------------------------------------------------------------------

  private dispatchLinkEvent(session: ActiveSession, event: DebugLinkEvent): void {
    void this.queue.enqueue(() =>
      this.guard(`link event ${event.type}`, () => {
        if (this.session !== session) {
          this.logger.debug('Dropping event from a discarded link', { type: event.type });
          return;
        }
        return routeLinkEvent(event, this.linkHandlers);
      }),
    );
  }

  private dispatchLinkFailure(session: ActiveSession, error: unknown): void {
    void this.queue.enqueue(() =>
      this.guard('open link', () => {
        if (this.session !== session) {
          this.logger.debug('Ignoring a failure of a discarded link', { error: summarize(error) });
          return;
        }
        throw SessionError.fromLinkFailure(error);
      }),
    );
  }

  private dispatchProcessExit(session: ActiveSession, exit: ProcessExit): void {
    void this.queue.enqueue(() =>
      this.guard('process exit', () => this.handleProcessFinished(session, exit)),
    );
  }

  private async handleBootstrap(): Promise<void> {
    if (this.phase !== 'starting') {
      throw SessionError.invalidTransition('bootstrap the debugger', this.phase);
    }
    for (const file of this.openFiles) {
      for (const breakpoint of this.store.enabledFor(file)) {
        await this.send((link) => link.setBreakpoint(breakpoint.file, breakpoint.line));
      }
    }
    await this.send((link) => link.run());
    this.transition('running');
  }

  private handleLine(file: string, line: number): void {
    if (!isLinkReady(this.phase)) {
      throw SessionError.invalidTransition('stop at a line', this.phase);
    }
    const uiLine = toUiLine(line);
    this.transition('paused');
    this.position = { file, line: uiLine };
    this.ui.moveSelection(file, uiLine);
  }

  private handleStack(frames: StackSnapshot): void {
    const innermost = frames[0];
    if (!innermost) {
      this.logger.debug('Received an empty stack snapshot');
      return;
    }
    this.ui.updateInspector({ ...innermost.locals }, frames);
  }

  private handleBreakpointEnable(ref: BreakpointRef): void {
    const uiLine = toUiLine(ref.line);
    const existing = this.store.get(ref.file, ref.line);
    if (existing) {
      this.store.enable(existing);
    } else {
      this.store.create(ref.file, ref.line);
    }
    this.addMarker(ref.file, uiLine);
  }

  private handleBreakpointDisable(ref: BreakpointRef): void {
    const uiLine = toUiLine(ref.line);
    const existing = this.store.get(ref.file, ref.line);
    if (existing) {
      this.store.disable(existing);
    }
    this.removeMarker(ref.file, uiLine);
  }

  private handlePostmortem(context: unknown): void {
    const summary = summarize(context);
    this.logger.error('Debugger postmortem', undefined, { context: summary, phase: this.phase });
    logEvent('error', 'session:postmortem', { context: summary, phase: this.phase });
    this.ui.showStatus(statusMessages.postmortem(summary));
  }

  private ignoreEvent(type: string, data: Record<string, unknown>): void {
    this.logger.debug(`No handling for ${type} events yet`, data);
  }

  // ---------------------------------------------------------------------------
  // Plumbing
  // ---------------------------------------------------------------------------

  private async send(request: (link: DebugLink) => Promise<void>): Promise<void> {
    const link = this.session?.link;
    if (!link) {
      throw SessionError.linkError('the debug link is not open');
    }
    try {
      await request(link);
    } catch (error) {
      throw SessionError.fromLinkFailure(error);
    }
  }

  private transition(to: SessionPhase): void {
    const from = this.phase;
    if (from === to) return;
    if (!canTransition(from, to)) {
      throw SessionError.invalidTransition(`move to ${to}`, from);
    }
    this.phase = to;
    logEvent('debug', 'session:phase', { from, to });
    this.events.emit('phase', { from, to }).catch((error: unknown) => {
      this.logger.error('Phase listener failed', error);
    });
  }

  /**
   * Runs one dispatch and settles every failure into a defined phase.
   */
  private async guard(action: string, work: () => Promise<void> | void): Promise<void> {
    try {
      await work();
    } catch (error) {
      try {
        await this.recover(action, error);
      } catch (recoveryError) {
        logError('session-controller:recover', recoveryError, { action });
        this.logger.error(`Recovery after ${action} failed`, recoveryError);
      }
    }
  }

  private async recover(action: string, error: unknown): Promise<void> {
    if (isSessionError(error)) {
      if (error.recoverable) {
        this.logger.warn(error.message, { action, code: error.code, phase: this.phase });
        if (error.code === SessionErrorCode.NO_ACTIVE_DOCUMENT) {
          await this.teardown();
        }
        return;
      }
      this.logger.error(error.message, error.cause, { action, code: error.code });
      logEvent('error', 'session:failure', { action, ...error.toJSON() });
      this.ui.showStatus(error.message);
      await this.teardown();
      return;
    }

    logError(`session-controller:${action}`, error, { phase: this.phase });
    this.logger.error(`Unexpected failure during ${action}`, error, { phase: this.phase });
    if (this.phase === 'starting') {
      await this.teardown();
    }
  }
}

function summarize(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

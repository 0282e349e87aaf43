import { NoOpLogger } from '@stepwise/core';
import type { ControllerConfigInput } from '@stepwise/schemas';
import { SessionController } from '../../src/controller/session-controller.js';
import { BreakpointStore } from '../../src/breakpoints/breakpoint-store.js';
import type { DebugDocument, ModeHost } from '../../src/types/index.js';
import { FakeDebugLink, type LinkRequestName } from './fake-debug-link.js';
import { FakeDocumentSource } from './fake-document-source.js';
import { FakeProcessHandle } from './fake-process-handle.js';
import { RecordingUiSink } from './recording-ui-sink.js';

export interface HarnessOptions {
  /** Defaults to a saved, unmodified `a.py`; `null` means no open document */
  document?: DebugDocument | null;
  saveAs?: string | null;
  launchError?: Error;
  /** Link requests that reject on every link the controller creates */
  linkFailures?: LinkRequestName[];
  /** The link's `open` never settles */
  stallLinkOpen?: boolean;
  config?: ControllerConfigInput;
}

export interface Harness {
  controller: SessionController;
  store: BreakpointStore;
  ui: RecordingUiSink;
  documents: FakeDocumentSource;
  modes: string[];
  processes: FakeProcessHandle[];
  links: FakeDebugLink[];
  link(): FakeDebugLink;
  process(): FakeProcessHandle;
}

/**
 * Wires a controller to in-process fakes of everything it talks to.
 */
export function createHarness(options: HarnessOptions = {}): Harness {
  const ui = new RecordingUiSink();
  const documents = new FakeDocumentSource(
    options.document === undefined ? { path: 'a.py', modified: false } : options.document,
    options.saveAs ?? null,
  );
  const modes: string[] = [];
  const host: ModeHost = {
    changeMode: (name) => {
      modes.push(name);
    },
  };
  const processes: FakeProcessHandle[] = [];
  const links: FakeDebugLink[] = [];
  const store = new BreakpointStore();

  const controller = new SessionController({
    ui,
    documents,
    host,
    store,
    config: options.config,
    logger: new NoOpLogger(),
    createProcess: (request) => {
      const handle = new FakeProcessHandle(request, options.launchError);
      processes.push(handle);
      return handle;
    },
    createLink: (target) => {
      const link = new FakeDebugLink(target);
      for (const name of options.linkFailures ?? []) {
        link.failOn(name);
      }
      if (options.stallLinkOpen) {
        link.stallOpen();
      }
      links.push(link);
      return link;
    },
  });

  return {
    controller,
    store,
    ui,
    documents,
    modes,
    processes,
    links,
    link: () => {
      const link = links[links.length - 1];
      if (!link) throw new Error('No debug link was created');
      return link;
    },
    process: () => {
      const handle = processes[processes.length - 1];
      if (!handle) throw new Error('No process was launched');
      return handle;
    },
  };
}

/** Starts a session and completes the bootstrap handshake. */
export async function startRunning(harness: Harness): Promise<void> {
  await harness.controller.start();
  harness.link().emit({ type: 'bootstrap' });
  await harness.controller.settled();
}

/** Starts a session and stops at `line` (1-based) of `file`. */
export async function startPaused(harness: Harness, file: string, line: number): Promise<void> {
  await startRunning(harness);
  harness.link().emit({ type: 'line', file, line });
  await harness.controller.settled();
}

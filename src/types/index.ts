/**
 * Core types for the fillmark pipeline.
 *
 * A save flows through the pipeline as:
 *   ChangeEvent -> MarkerLocation -> CompletionContext -> CompletionResult -> PatchPlan
 * and per-path state is tracked by a FileSession.
 */

// ============================================================================
// FILESYSTEM EVENTS
// ============================================================================

/** Where a change came from. Self events are produced by our own writes. */
export type ChangeOrigin = 'external' | 'self';

/** Raw notification kinds forwarded by the watcher */
export type RawEventKind = 'add' | 'change' | 'unlink';

/** Modification-time fingerprint of a file on disk */
export interface FileFingerprint {
  mtimeMs: number;
  size: number;
}

/** Notification straight from the filesystem watcher, before classification */
export interface RawFileEvent {
  kind: RawEventKind;
  path: string;
  timestamp: number;
  /** Present when the watcher could stat the file */
  fingerprint?: FileFingerprint;
}

/** A logical "file changed" signal, emitted once per debounce window */
export interface ChangeEvent {
  path: string;
  timestamp: number;
  origin: ChangeOrigin;
  fingerprint?: FileFingerprint;
}

// ============================================================================
// MARKER + CONTEXT
// ============================================================================

/** Location of the first marker occurrence in a file */
export interface MarkerLocation {
  path: string;
  /** String index of the marker's first character */
  offset: number;
  /** UTF-8 byte offset of the marker's first byte */
  byteOffset: number;
  /** 1-based line number */
  line: number;
  /** 1-based column (in characters) */
  column: number;
  /** Full text of the line holding the marker, without its newline */
  lineText: string;
  /** The marker token that matched */
  marker: string;
}

/** Bounded view of the file around the marker, sent to the completion client */
export interface CompletionContext {
  path: string;
  /** Language hint from the extension map ('unknown' when not mapped) */
  language: string;
  /** Text between the window start and the marker */
  prefix: string;
  /** Text between the marker end and the window end */
  suffix: string;
  /** String index in the file where `prefix` starts */
  windowStart: number;
  /** String index in the file where `suffix` ends */
  windowEnd: number;
  markerOffset: number;
  markerLength: number;
  /** Wider view used for the document section of the prompt */
  documentPrefix: string;
  documentSuffix: string;
}

// ============================================================================
// COMPLETION
// ============================================================================

/** The edit the model proposes, as parsed from its response */
export type SuggestedEdit =
  | {
      kind: 'insert';
      /** Text that replaces the marker */
      text: string;
    }
  | {
      kind: 'replace';
      /** Text the model quoted before the cursor */
      before: string;
      /** Text the model quoted after the cursor */
      after: string;
      /** Rewritten text for the whole quoted region */
      replacement: string;
    };

export interface CompletionResult {
  sessionId: string;
  context: CompletionContext;
  status: 'success' | 'failure';
  suggestion?: SuggestedEdit;
  error?: string;
  tokensUsed: number;
  latencyMs: number;
}

// ============================================================================
// PATCHING
// ============================================================================

/** Replace the text in [start, end) with `text` */
export interface TextEdit {
  start: number;
  end: number;
  text: string;
}

export interface PatchPlan {
  path: string;
  /** File content at scan time */
  snapshot: string;
  markerStart: number;
  markerEnd: number;
  /** Span of the snapshot being rewritten; contains the marker */
  regionStart: number;
  regionEnd: number;
  /** Span that must be unchanged on disk when the patch is applied */
  verifyStart: number;
  verifyEnd: number;
  /** New text for [regionStart, regionEnd) */
  replacement: string;
  /** Minimal edits over snapshot indices that turn the region into `replacement` */
  edits: TextEdit[];
}

export type PatchOutcome =
  | { status: 'applied'; path: string; content: string; edits: TextEdit[] }
  | { status: 'stale'; path: string; reason: string }
  | { status: 'superseded'; path: string };

// ============================================================================
// SESSIONS
// ============================================================================

export type SessionState = 'idle' | 'pending' | 'completed' | 'failed' | 'superseded';

export interface FileSession {
  id: string;
  path: string;
  state: SessionState;
  startedAt: number;
  /** Aborted when the session is superseded */
  signal: AbortSignal;
}

/** What happened to one change event, reported by the orchestrator */
export type ProcessOutcome =
  | { status: 'skipped'; path: string; reason: SkipReason }
  | { status: 'applied'; path: string; sessionId: string; content: string }
  | { status: 'failed'; path: string; sessionId?: string; error: string }
  | { status: 'superseded'; path: string; sessionId: string }
  | { status: 'stale'; path: string; sessionId: string; reason: string };

export type SkipReason =
  | 'untracked'
  | 'missing'
  | 'too-large'
  | 'binary'
  | 'unchanged'
  | 'no-marker';

// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration, CORE utilities and the corpus loader; other SHELL modules stay internal
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, Effects or typed interfaces
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Interactive session for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runSession } from "yijing-table";
 *
 * const exitCode = await Effect.runPromise(
 *   runSession({ noColor: true, seed: 7 }),
 * );
 * ```
 */
export { runSession, type SessionIO } from "./app/runSession.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	Coin,
	Coins,
	ExitCode,
	Hexagram,
	Line,
	LineKind,
	Position,
	SixLines,
	YaoValue,
} from "./core/models.js";
export type {
	CLIOptions,
	SessionSettings,
	TableConfig,
} from "./core/types/index.js";
export type { Corpus, HexagramEntry } from "./core/interpretation.js";
export type { Command, SessionDeps, SessionState, Transition } from "./core/session.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	ConfigError,
	CorpusError,
	InvalidPosition,
	InvariantViolation,
	MissingPositions,
} from "./core/errors.js";
export type { AppError, PositionError } from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Line classification and construction.
 *
 * @pure true
 */
export { changeLine, classifyCoins, lineFromCoins, lineKind } from "./core/line.js";

/**
 * Hexagram identity and changing-hexagram derivation.
 *
 * @pure true
 */
export {
	computeIdentity,
	deriveChangingHexagram,
	lineAt,
	makeHexagram,
	mutablePositions,
	partitionPositions,
	toBinaryString,
} from "./core/hexagram.js";

/**
 * Random casting through Effect's Random service.
 *
 * @effect Effect<Hexagram>
 */
export { castLine, generateHexagram, withSeed } from "./core/generator.js";

export { parsePositions, toPosition } from "./core/positions.js";
export { corpusKey, formatEntry, interpret, makeCorpus } from "./core/interpretation.js";
export { makePalette, renderHexagram, renderLine } from "./core/format/render.js";
export { initialState, parseCommand, step } from "./core/session.js";
export { loadCorpus } from "./shell/corpus/loader.js";

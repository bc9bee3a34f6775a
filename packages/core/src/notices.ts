/**
 * Classified diagnostics emitted while loading databases and decoding frames.
 *
 * Nothing in the engine writes to a stream on its own; every notice goes
 * through a {@link NoticeSink} supplied by the caller.
 */

export type NoticeSeverity = "debug" | "info" | "warning" | "error";

export type NoticeKind =
	| "NOT_INITIALIZED"
	| "INVALID_FRAME"
	| "MISSING_LOOKUP_ENTRY"
	| "MALFORMED_DESCRIPTOR"
	| "OUT_OF_RANGE_ADDRESS";

export interface DecodeNotice {
	kind: NoticeKind;
	severity: NoticeSeverity;
	message: string;
	pgn?: number;
	spn?: number;
	sourceAddress?: number;
}

export type NoticeSink = (notice: DecodeNotice) => void;

const SEVERITY_RANK: Record<NoticeSeverity, number> = {
	debug: 0,
	info: 1,
	warning: 2,
	error: 3,
};

export const NOTICE_SEVERITIES: readonly NoticeSeverity[] = [
	"debug",
	"info",
	"warning",
	"error",
];

export function isNoticeSeverity(value: string): value is NoticeSeverity {
	return NOTICE_SEVERITIES.some((severity) => severity === value);
}

/** Writes each notice to stderr */
export const consoleNoticeSink: NoticeSink = (notice) => {
	console.error(`[j1939] ${notice.message}`);
};

/**
 * Wrap a sink so that notices below `minSeverity` are dropped.
 *
 * @example
 * const notify = filterNotices(consoleNoticeSink, "warning");
 * notify({ kind: "MISSING_LOOKUP_ENTRY", severity: "info", message: "..." }); // dropped
 */
export function filterNotices(
	sink: NoticeSink,
	minSeverity: NoticeSeverity,
): NoticeSink {
	const threshold = SEVERITY_RANK[minSeverity];
	return (notice) => {
		if (SEVERITY_RANK[notice.severity] >= threshold) {
			sink(notice);
		}
	};
}

import type { NoticeSeverity, NoticeSink } from "@j1939-decode/core";
import { filterNotices } from "@j1939-decode/core";

/**
 * Sink that writes notices to stderr. stdout carries the MCP protocol, so
 * nothing else may be written there.
 */
export function createStderrNoticeSink(minSeverity: NoticeSeverity): NoticeSink {
	return filterNotices((notice) => {
		process.stderr.write(`[j1939] ${notice.message}\n`);
	}, minSeverity);
}

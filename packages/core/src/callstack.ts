/**
 * Call-stack capture for entry annotation.
 */

import { fileURLToPath } from 'node:url';

interface Frame {
	file: string;
	line: number;
}

// "    at fn (/path/file.ts:10:5)", "    at /path/file.ts:10:5", "    at async fn (file:///x.js:1:2)", "    at async file:///x.js:1:2"
const FRAME_RE = /^\s*at (?:async )?(?:.*?\()?(.+?):(\d+):\d+\)?$/;

function parseFrame(line: string): Frame | null {
	const match = FRAME_RE.exec(line);
	if (!match) return null;
	let file = match[1] ?? '';
	if (file.startsWith('file://')) file = fileURLToPath(file);
	return { file, line: Number.parseInt(match[2] ?? '0', 10) };
}

function stackLines(): string[] {
	const previousLimit = Error.stackTraceLimit;
	Error.stackTraceLimit = Number.POSITIVE_INFINITY;
	try {
		const { stack = '' } = new Error();
		// Drop the "Error" header plus the frames of stackLines and captureCallStack
		return stack.split('\n').slice(3);
	} finally {
		Error.stackTraceLimit = previousLimit;
	}
}

/**
 * Render the caller's stack as `\n<file>:<line>` per frame, innermost first.
 *
 * @param skip - frames to skip above the caller of captureCallStack
 * @param maxFrames - most frames to render
 * @param filter - substring a frame's file path must contain; empty accepts all
 */
export function captureCallStack(skip: number, maxFrames: number, filter = ''): string {
	if (maxFrames <= 0) return '';
	let out = '';
	let count = 0;
	for (const line of stackLines().slice(Math.max(skip, 0))) {
		if (count >= maxFrames) break;
		const frame = parseFrame(line);
		if (!frame) continue;
		if (filter === '' || frame.file.includes(filter)) {
			out += `\n${frame.file}:${frame.line}`;
			count++;
		}
	}
	return out;
}

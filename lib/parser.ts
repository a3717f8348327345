import { ProbeOutcome } from './types';

// [1597166438.798339] 64 bytes from 8.8.8.8: icmp_seq=1 ttl=118 time=14.2 ms
// [1597411489.934841] From 10.0.0.1 icmp_seq=14 Packet filtered
// [1597500391.382726] no answer yet for icmp_seq=13317
const TIMESTAMP_PREFIX = /^\[([0-9]+(?:\.[0-9]+)?)\]\s*(.*)$/;
const HEADER = /^PING\s/;
const SEQUENCE = /\b(?:icmp_)?seq=([0-9]+)\b/;
const ROUNDTRIP = /\btime[=<]\s*([0-9]+(?:\.[0-9]+)?)\s*ms\b/;
const REPLY_FLAG = /\(([^()]*!)\)/g;
const ERROR_MARKER =
  /^From\s|unreachable|filtered|exceeded|no answer|timed out|timeout|prohibited|redirect|error/i;

function parseSequence(text: string): number | undefined {
  const match = text.match(SEQUENCE);
  if (!match) {
    return undefined;
  }
  const value = Number(match[1]);
  return Number.isSafeInteger(value) ? value : undefined;
}

function parseRoundtripMs(text: string): number | undefined {
  const match = text.match(ROUNDTRIP);
  if (!match) {
    return undefined;
  }
  const value = Number(match[1]);
  return Number.isFinite(value) ? value : undefined;
}

function parseFlags(text: string): string[] {
  return Array.from(text.matchAll(REPLY_FLAG), (match) => match[1].trim()).filter(Boolean);
}

function describeError(body: string): string {
  const match = body.match(SEQUENCE);
  if (match && match.index !== undefined) {
    const tail = body.slice(match.index + match[0].length).trim();
    if (tail) {
      return tail;
    }
  }
  return body.trim();
}

function looksLikeProbe(text: string): boolean {
  return SEQUENCE.test(text) && (ROUNDTRIP.test(text) || ERROR_MARKER.test(text));
}

function stripLineEnding(line: string): string {
  return line.replace(/\r?\n$/, '').trimEnd();
}

/**
 * Classifies one line of `ping -D` output. Never throws: anything outside
 * the dialect comes back as `unrecognized` with the reason it was rejected.
 */
export function parseProbeLine(rawLine: string, capturedAt: number = Date.now()): ProbeOutcome {
  const raw = stripLineEnding(rawLine);

  if (HEADER.test(raw)) {
    return { kind: 'unrecognized', reason: 'header', raw };
  }

  const stamped = raw.match(TIMESTAMP_PREFIX);
  if (!stamped) {
    return {
      kind: 'unrecognized',
      reason: looksLikeProbe(raw) ? 'missing-timestamp' : 'unknown',
      raw
    };
  }

  const probedAt = Math.round(Number(stamped[1]) * 1000);
  const body = stamped[2];
  const sequence = parseSequence(body);
  const roundtripMillis = parseRoundtripMs(body);

  if (roundtripMillis !== undefined) {
    if (sequence === undefined) {
      return { kind: 'unrecognized', reason: 'no-sequence', raw };
    }
    return {
      kind: 'reply',
      sequence,
      roundtripMillis,
      flags: parseFlags(body),
      probedAt,
      capturedAt,
      raw
    };
  }

  if (sequence !== undefined || ERROR_MARKER.test(body)) {
    return {
      kind: 'error',
      sequence,
      message: describeError(body),
      probedAt,
      capturedAt,
      raw
    };
  }

  return { kind: 'unrecognized', reason: 'no-sequence', raw };
}

import { HookInput } from '../types/hook.types';

const SESSION_SOURCES: ReadonlyArray<NonNullable<HookInput['source']>> = [
  'startup',
  'resume',
  'clear',
  'compact',
];

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Parse the JSON a hook receives on stdin. Anything that is not a JSON
 * object yields an empty input; fields of the wrong type are dropped.
 */
export function parseHookInput(raw: string): HookInput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }

  const record: Record<string, unknown> = { ...parsed };
  const input: HookInput = {};

  const sessionId = optionalString(record.session_id);
  if (sessionId !== undefined) input.session_id = sessionId;
  const transcriptPath = optionalString(record.transcript_path);
  if (transcriptPath !== undefined) input.transcript_path = transcriptPath;
  const cwd = optionalString(record.cwd);
  if (cwd !== undefined) input.cwd = cwd;
  const eventName = optionalString(record.hook_event_name);
  if (eventName !== undefined) input.hook_event_name = eventName;
  const source = SESSION_SOURCES.find((s) => s === record.source);
  if (source !== undefined) input.source = source;

  return input;
}

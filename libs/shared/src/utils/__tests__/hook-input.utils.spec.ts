import { parseHookInput } from '../hook-input.utils';

describe('parseHookInput', () => {
  it('should keep known string fields', () => {
    const raw = JSON.stringify({
      session_id: 'abc-123',
      cwd: '/work/project',
      hook_event_name: 'SessionStart',
      source: 'startup',
      extra: true,
    });

    expect(parseHookInput(raw)).toEqual({
      session_id: 'abc-123',
      cwd: '/work/project',
      hook_event_name: 'SessionStart',
      source: 'startup',
    });
  });

  it('should drop fields with the wrong type', () => {
    expect(parseHookInput('{"cwd": 42, "source": "reboot"}')).toEqual({});
  });

  it('should return empty input for non-object JSON', () => {
    expect(parseHookInput('[1, 2]')).toEqual({});
    expect(parseHookInput('null')).toEqual({});
    expect(parseHookInput('"text"')).toEqual({});
  });

  it('should return empty input for invalid JSON', () => {
    expect(parseHookInput('')).toEqual({});
    expect(parseHookInput('not json')).toEqual({});
  });
});

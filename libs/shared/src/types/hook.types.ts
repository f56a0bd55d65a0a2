export interface HookInput {
  session_id?: string;
  transcript_path?: string;
  cwd?: string;
  hook_event_name?: string;
  source?: 'startup' | 'resume' | 'clear' | 'compact';
}

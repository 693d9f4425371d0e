import { describe, it, expect } from 'vitest';
import { isRetriedKind, resolveTaskKind } from '../src/dispatch/task-registry';

describe('resolveTaskKind', () => {
  it('should accept canonical names', () => {
    expect(resolveTaskKind('mix_stems')).toBe('mix_stems');
    expect(resolveTaskKind('health_check')).toBe('health_check');
  });

  it('should map legacy producer names', () => {
    expect(resolveTaskKind('app.tasks.generate_hash_and_webhook')).toBe('hash_and_notify');
    expect(resolveTaskKind('app.tasks.process_duplicate_file')).toBe('delete_duplicate');
    expect(resolveTaskKind('cleanup_temp_files')).toBe('cleanup_temp');
  });

  it('should return undefined for unknown names', () => {
    expect(resolveTaskKind('transcode_video')).toBeUndefined();
  });
});

describe('isRetriedKind', () => {
  it('should never retry maintenance tasks', () => {
    expect(isRetriedKind('health_check')).toBe(false);
    expect(isRetriedKind('cleanup_temp')).toBe(false);
    expect(isRetriedKind('analyze_audio')).toBe(true);
  });
});

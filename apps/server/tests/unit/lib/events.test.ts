import { describe, it, expect, vi } from 'vitest';
import { createEventEmitter, type BrandingEvent } from '@/lib/events.js';

describe('events.ts', () => {
  it('should deliver events to every subscriber', () => {
    const emitter = createEventEmitter();
    const a = vi.fn();
    const b = vi.fn();
    emitter.subscribe(a);
    emitter.subscribe(b);

    const event: BrandingEvent = { type: 'branding:hooks-applied', payload: { entryId: null } };
    emitter.emit(event);

    expect(a).toHaveBeenCalledWith(event);
    expect(b).toHaveBeenCalledWith(event);
  });

  it('should stop delivering after unsubscribe', () => {
    const emitter = createEventEmitter();
    const callback = vi.fn();
    const unsubscribe = emitter.subscribe(callback);

    unsubscribe();
    emitter.emit({ type: 'branding:entry-removed', payload: { entryId: 'entry-1' } });

    expect(callback).not.toHaveBeenCalled();
  });

  it('should isolate failing subscribers', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const emitter = createEventEmitter();
    const after = vi.fn();
    emitter.subscribe(() => {
      throw new Error('subscriber failed');
    });
    emitter.subscribe(after);

    emitter.emit({ type: 'branding:hooks-removed', payload: { entryId: null } });

    expect(after).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(
      '[Events]',
      'Error in event subscriber:',
      expect.any(Error)
    );
    errorSpy.mockRestore();
  });
});

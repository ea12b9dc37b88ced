import { beforeEach, vi } from 'vitest';

beforeEach(() => {
    // Components log through console; keep test output readable.
    vi.spyOn(console, 'log').mockImplementation(() => { });
    vi.spyOn(console, 'warn').mockImplementation(() => { });
    vi.spyOn(console, 'error').mockImplementation(() => { });
});

/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ChildProcess } from 'node:child_process';
import open from 'open';
import { openBrowserSecurely, shouldLaunchBrowser } from './browser.js';

vi.mock('open', () => ({ default: vi.fn() }));

describe('shouldLaunchBrowser', () => {
  it('launches on macOS and Windows desktops', () => {
    expect(shouldLaunchBrowser({}, 'darwin')).toBe(true);
    expect(shouldLaunchBrowser({}, 'win32')).toBe(true);
  });

  it('needs a display server on Linux', () => {
    expect(shouldLaunchBrowser({}, 'linux')).toBe(false);
    expect(shouldLaunchBrowser({ DISPLAY: ':0' }, 'linux')).toBe(true);
    expect(
      shouldLaunchBrowser({ WAYLAND_DISPLAY: 'wayland-0' }, 'linux'),
    ).toBe(true);
  });

  it('stays headless in CI, over SSH and when opted out', () => {
    expect(shouldLaunchBrowser({ CI: 'true' }, 'darwin')).toBe(false);
    expect(shouldLaunchBrowser({ NO_BROWSER: '1' }, 'darwin')).toBe(false);
    expect(
      shouldLaunchBrowser({ SSH_CONNECTION: '10.0.0.1 22 10.0.0.2 22' }),
    ).toBe(false);
    expect(
      shouldLaunchBrowser(
        { SSH_CONNECTION: '10.0.0.1 22 10.0.0.2 22', DISPLAY: ':10' },
        'linux',
      ),
    ).toBe(true);
  });

  it('treats text-mode browsers as unusable', () => {
    expect(shouldLaunchBrowser({ BROWSER: 'lynx' }, 'darwin')).toBe(false);
    expect(shouldLaunchBrowser({ BROWSER: 'firefox' }, 'darwin')).toBe(true);
  });
});

describe('openBrowserSecurely', () => {
  const openMock = vi.mocked(open);

  beforeEach(() => {
    openMock.mockReset();
  });

  it('opens http and https URLs', async () => {
    const child = new ChildProcess();
    openMock.mockResolvedValue(child);

    await openBrowserSecurely('https://auth.example.test/authorize?x=1');

    expect(openMock).toHaveBeenCalledWith(
      'https://auth.example.test/authorize?x=1',
    );
    expect(child.listenerCount('error')).toBe(1);
  });

  it('refuses other protocols without launching anything', async () => {
    await expect(openBrowserSecurely('file:///etc/passwd')).rejects.toThrow(
      'Unsafe protocol file:; only http and https URLs can be opened',
    );
    await expect(openBrowserSecurely('not a url')).rejects.toThrow(
      'Invalid URL: not a url',
    );
    expect(openMock).not.toHaveBeenCalled();
  });
});

import { describe, expect, it } from 'vitest';
import { parseConfig } from '../src/config.js';

describe('parseConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = parseConfig({});

    expect(config.port).toBe(8000);
    expect(config.wsPath).toBe('/ws');
    expect(config.maxBufferedBytes).toBe(4 * 1024 * 1024);
    expect(config.captureFps).toBe(5);
    expect(config.idlePollMs).toBe(500);
    expect(config.sourceRetryMs).toBe(1000);
    expect(config.viewport).toEqual({ width: 1280, height: 720 });
    expect(config.startUrl).toBe('https://example.com');
    expect(config.jpegQuality).toBe(60);
    expect(config.defaultUrlScheme).toBe('http');
    expect(config.mirrorEnabled).toBe(false);
    expect(config.logPretty).toBe(false);
  });

  it('coerces overrides from strings', () => {
    const config = parseConfig({
      CAPTURE_FPS: '12',
      MIRROR_ENABLED: 'true',
      DEFAULT_URL_SCHEME: 'HTTPS',
      CORS_ORIGINS: 'http://a.test, http://b.test',
    });

    expect(config.captureFps).toBe(12);
    expect(config.mirrorEnabled).toBe(true);
    expect(config.defaultUrlScheme).toBe('https');
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });

  it('rejects invalid values', () => {
    expect(() => parseConfig({ JPEG_QUALITY: '0' })).toThrow();
    expect(() => parseConfig({ WS_PATH: 'ws' })).toThrow();
    expect(() => parseConfig({ CAPTURE_FPS: '-1' })).toThrow();
  });
});

import { describe, it, expect } from 'vitest';
import { buildTrackMetadata, formatRuntime, trackMetadataSchema } from '../../domains/sources/metadata';

describe('track metadata', () => {
  describe('formatRuntime', () => {
    it('should format minutes and seconds below an hour', () => {
      expect(formatRuntime(0)).toBe('0:00');
      expect(formatRuntime(65)).toBe('1:05');
      expect(formatRuntime(59.9)).toBe('0:59');
    });

    it('should add hours from an hour up', () => {
      expect(formatRuntime(3600)).toBe('1:00:00');
      expect(formatRuntime(3725)).toBe('1:02:05');
    });

    it('should treat negative and non-finite values as zero', () => {
      expect(formatRuntime(-3)).toBe('0:00');
      expect(formatRuntime(Number.NaN)).toBe('0:00');
    });
  });

  describe('buildTrackMetadata', () => {
    it('should build a record from fetched values', () => {
      expect(buildTrackMetadata('https://example.com/a', 'Song A', 125.7)).toEqual({
        url: 'https://example.com/a',
        title: 'Song A',
        runtimeSeconds: 125,
        runtimeDisplay: '2:05',
      });
    });

    it('should fall back to the url for a blank title and zero for a missing duration', () => {
      const record = buildTrackMetadata('https://example.com/a', '  ', undefined);

      expect(record).toEqual({ url: 'https://example.com/a', title: 'https://example.com/a', runtimeSeconds: 0, runtimeDisplay: '0:00' });
      expect(trackMetadataSchema.safeParse(record).success).toBe(true);
    });
  });
});

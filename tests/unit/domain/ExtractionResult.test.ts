import { ExtractionResult } from '../../../src/domain/extraction/ExtractionResult';

describe('ExtractionResult', () => {
  it('should expose a found result', () => {
    const result = ExtractionResult.found('https://site.example/1', 'https://cdn.example.com/a.mp4', 'media_element');

    expect(result.isFound()).toBe(true);
    expect(result.pageUrl).toBe('https://site.example/1');
    expect(result.downloadUrl).toBe('https://cdn.example.com/a.mp4');
    expect(result.strategy).toBe('media_element');
  });

  it('should expose an empty result', () => {
    const result = ExtractionResult.none('https://site.example/1');

    expect(result.isFound()).toBe(false);
    expect(result.downloadUrl).toBeNull();
    expect(result.strategy).toBeNull();
  });

  it('should compare by value', () => {
    const a = ExtractionResult.found('https://site.example/1', 'https://cdn.example.com/a.mp4', 'static_selector');
    const b = ExtractionResult.found('https://site.example/1', 'https://cdn.example.com/a.mp4', 'static_selector');
    const c = ExtractionResult.none('https://site.example/1');

    expect(a.equals(b)).toBe(true);
    expect(a.equals(c)).toBe(false);
    expect(a.equals(null)).toBe(false);
  });

  it('should be immutable', () => {
    const result = ExtractionResult.none('https://site.example/1');

    expect(Object.isFrozen(result.toValue())).toBe(true);
  });
});

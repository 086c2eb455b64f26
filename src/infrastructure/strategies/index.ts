export { StaticSelectorStrategy, StaticSelectorOptions, isClickableSelector } from './StaticSelectorStrategy';
export { CapturedResponseStrategy } from './CapturedResponseStrategy';
export { MediaElementStrategy } from './MediaElementStrategy';
export { EmbeddedFrameStrategy } from './EmbeddedFrameStrategy';

export { OVERLAY, WATERMARK_DEFAULTS } from './config/constants';
export {
  computeMaxAllowedWidth,
  computeOverlayLayout,
  type OverlayLayout,
  type OverlayRow,
  type TextMeasure,
} from './core/overlay-geometry';
export {
  OverlayRenderer,
  type OverlayRenderResult,
  type OverlayRendererOptions,
} from './core/overlay-renderer';
export {
  PageWatermarkCompositor,
  type WatermarkTarget,
} from './core/page-watermark-compositor';
export { WatermarkError } from './errors/watermark-error';

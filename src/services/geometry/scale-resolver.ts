import { WorldScale } from '../../types/floor-plan.types';
import { WORLD_FOOTPRINT } from '../../utils/constants';
import { ValidationError } from '../../utils/errors';

/**
 * Pixel-to-world factors that stretch the image onto the fixed world footprint.
 * The result is a normalization, not a physical measurement.
 */
export const resolveScale = (width: number, height: number): WorldScale => {
  if (!Number.isFinite(width) || width <= 0) {
    throw new ValidationError(`Image width must be a positive number, got ${width}`, { width });
  }
  if (!Number.isFinite(height) || height <= 0) {
    throw new ValidationError(`Image height must be a positive number, got ${height}`, { height });
  }

  return {
    scaleX: WORLD_FOOTPRINT / width,
    scaleY: WORLD_FOOTPRINT / height
  };
};

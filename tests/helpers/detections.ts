import { DetectorPayload } from '../../src/types/api.types';

export type LabeledRect = [x1: number, y1: number, x2: number, y2: number, label?: string];

/**
 * Build a payload in the detector's wire form.
 */
export const detectorPayload = (
  width: number,
  height: number,
  elements: LabeledRect[],
  averageDoor?: number
): DetectorPayload => ({
  points: elements.map(([x1, y1, x2, y2]) => ({ x1, y1, x2, y2 })),
  classes: elements.map(([, , , , label]) => (label === undefined ? {} : { name: label })),
  Width: width,
  Height: height,
  ...(averageDoor !== undefined && { averageDoor })
});

// 10x10 px plan so world coordinates equal pixel coordinates
export const unitPlan = (elements: LabeledRect[]): DetectorPayload => detectorPayload(10, 10, elements);

import { z } from 'zod';
import { ValidationError } from '../utils/errors';

export const INDEX_NAMES = ['NDVI', 'RECI', 'NDMI', 'MSAVI'] as const;

export type IndexName = (typeof INDEX_NAMES)[number];

export type VisualizationSpec = {
  min: number;
  max: number;
  palette: string[];
};

export const VISUALIZATIONS: Record<IndexName, VisualizationSpec> = {
  // brown, red, yellow, green
  NDVI: { min: 0, max: 1, palette: ['#8B4513', '#FF0000', '#FFFF00', '#008000'] },
  // dark red, orange, yellow, light green, dark green
  RECI: { min: 0, max: 5, palette: ['#8B0000', '#FFA500', '#FFFF00', '#90EE90', '#006400'] },
  // dark brown, red, yellow, light green, dark blue
  NDMI: { min: -1, max: 1, palette: ['#3B2C1C', '#FF0000', '#FFFF00', '#90EE90', '#00008B'] },
  // dark brown, red, orange, light green, dark green
  MSAVI: { min: 0, max: 1, palette: ['#3B2C1C', '#FF0000', '#FFA500', '#90EE90', '#006400'] }
};

const PositionSchema = z.tuple([z.number(), z.number()]);
const RingSchema = z.array(PositionSchema).min(3);
const CoordinatesSchema = z.union([z.array(RingSchema).min(1), RingSchema]);

export type PolygonCoordinates = z.infer<typeof CoordinatesSchema>;

export type IndexRequest = {
  coordinates: PolygonCoordinates;
  index: IndexName;
};

function isIndexName(value: string): value is IndexName {
  return INDEX_NAMES.some((name) => name === value);
}

export function parseIndex(value: unknown): IndexName | undefined {
  if (typeof value !== 'string') return undefined;
  const upper = value.toUpperCase();
  return isIndexName(upper) ? upper : undefined;
}

export function visualizationFor(index: IndexName): VisualizationSpec {
  const spec = VISUALIZATIONS[index];
  return { min: spec.min, max: spec.max, palette: [...spec.palette] };
}

/**
 * Checks a request body in the order clients rely on: coordinates present,
 * index present, index known, then the polygon shape.
 */
export function parseIndexRequest(body: unknown): IndexRequest {
  const input: Record<string, unknown> =
    typeof body === 'object' && body !== null && !Array.isArray(body)
      ? Object.fromEntries(Object.entries(body))
      : {};
  if (input.coordinates === undefined || input.coordinates === null) {
    throw new ValidationError('No coordinates provided');
  }
  if (input.index === undefined || input.index === null) {
    throw new ValidationError('No index specified');
  }
  const index = parseIndex(input.index);
  if (!index) {
    throw new ValidationError('Invalid index specified');
  }
  const coordinates = CoordinatesSchema.safeParse(input.coordinates);
  if (!coordinates.success) {
    throw new ValidationError('Invalid coordinates provided');
  }
  return { coordinates: coordinates.data, index };
}

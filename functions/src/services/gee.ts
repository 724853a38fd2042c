/// <reference path="../types/earthengine.d.ts" />
import ee from '@google/earthengine';
import { EarthEngineError, errorMessage } from '../utils/errors';
import { ServiceAccountKey } from './credentials';
import { IndexName, PolygonCoordinates, VisualizationSpec } from './indices';

export type CompositeOptions = {
  collection: string;
  startDate: string;
  endDate: string;
  maxCloudPercent: number;
};

export type ThumbnailRequest = {
  coordinates: PolygonCoordinates;
  index: IndexName;
  visualization: VisualizationSpec;
  composite: CompositeOptions;
  dimensions: number;
};

export interface EarthEngineClient {
  authenticate(key: ServiceAccountKey): Promise<void>;
  hasValidToken(): boolean;
  getThumbnailUrl(request: ThumbnailRequest): Promise<string>;
}

const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';
const CLOUD_COVER_PROPERTY = 'CLOUDY_PIXEL_PERCENTAGE';

// Sentinel-2 band names
const NIR = 'B8';
const RED = 'B4';
const RED_EDGE = 'B5';
const SWIR = 'B11';

export function addIndexBands(image: ee.Image): ee.Image {
  const ndvi = image.normalizedDifference([NIR, RED]).rename('NDVI');
  const reci = image.normalizedDifference([NIR, RED_EDGE]).rename('RECI');
  const ndmi = image.normalizedDifference([NIR, SWIR]).rename('NDMI');

  const nir = image.select(NIR);
  const red = image.select(RED);
  // (2*NIR + 1 - sqrt((2*NIR + 1)^2 - 8*(NIR - RED))) / 2
  const msavi = nir
    .multiply(2)
    .add(1)
    .subtract(nir.multiply(2).add(1).pow(2).subtract(nir.subtract(red).multiply(8)).sqrt())
    .divide(2)
    .rename('MSAVI');

  return image.addBands([ndvi, reci, ndmi, msavi]);
}

export function buildIndexImage(request: ThumbnailRequest): { image: ee.Image; region: ee.Geometry } {
  const { composite } = request;
  const region = ee.Geometry.Polygon(request.coordinates);
  const median = ee
    .ImageCollection(composite.collection)
    .filterDate(composite.startDate, composite.endDate)
    .filter(ee.Filter.lt(CLOUD_COVER_PROPERTY, composite.maxCloudPercent))
    .median();
  const image = addIndexBands(median).clip(region).select(request.index).visualize(request.visualization);
  return { image, region };
}

function authenticate(key: ServiceAccountKey): Promise<void> {
  return new Promise((resolve, reject) => {
    ee.data.authenticateViaPrivateKey(
      key,
      () => {
        ee.initialize(
          null,
          null,
          () => resolve(),
          (error) => reject(new EarthEngineError(`Initialization failed: ${error.message}`, { cause: error })),
          null,
          key.project_id ?? null
        );
      },
      (error) => reject(new EarthEngineError(`Authentication failed: ${error}`)),
      [CLOUD_PLATFORM_SCOPE]
    );
  });
}

function getThumbnailUrl(request: ThumbnailRequest): Promise<string> {
  return new Promise((resolve, reject) => {
    try {
      const { image, region } = buildIndexImage(request);
      image.getThumbURL({ region, dimensions: request.dimensions, format: 'png' }, (url, error) => {
        if (error) {
          reject(new EarthEngineError(error));
        } else if (!url) {
          reject(new EarthEngineError('Earth Engine returned no thumbnail URL'));
        } else {
          resolve(url);
        }
      });
    } catch (err) {
      reject(new EarthEngineError(errorMessage(err), { cause: err }));
    }
  });
}

export const earthEngine: EarthEngineClient = {
  authenticate,
  // The client library drops its token once the expiry passes.
  hasValidToken: () => ee.data.getAuthToken() !== null,
  getThumbnailUrl
};

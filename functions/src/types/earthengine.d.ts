// The npm build of the Earth Engine client ships without typings. This covers
// the part of its surface the service calls.
declare module '@google/earthengine' {
  namespace ee {
    interface PrivateKey {
      client_email: string;
      private_key: string;
    }

    interface Geometry {}

    namespace Geometry {
      function Polygon(coords: unknown): Geometry;
    }

    interface Filter {}

    namespace Filter {
      function lt(name: string, value: number): Filter;
    }

    interface VisualizeParams {
      bands?: string[];
      min?: number;
      max?: number;
      palette?: string[];
    }

    interface ThumbParams {
      region?: Geometry;
      dimensions?: number | string;
      format?: string;
    }

    interface Image {
      normalizedDifference(bandNames: string[]): Image;
      rename(name: string): Image;
      select(band: string): Image;
      add(value: number | Image): Image;
      subtract(value: number | Image): Image;
      multiply(value: number | Image): Image;
      divide(value: number | Image): Image;
      pow(value: number | Image): Image;
      sqrt(): Image;
      addBands(images: Image[]): Image;
      clip(geometry: Geometry): Image;
      visualize(params: VisualizeParams): Image;
      getThumbURL(params: ThumbParams, callback: (url: string, error?: string) => void): void;
    }

    interface ImageCollection {
      filterDate(start: string, end: string): ImageCollection;
      filter(filter: Filter): ImageCollection;
      median(): Image;
    }

    function ImageCollection(id: string): ImageCollection;

    namespace data {
      function authenticateViaPrivateKey(
        privateKey: PrivateKey,
        success?: () => void,
        error?: (error: string) => void,
        extraScopes?: string[] | null,
        suppressDefaultScopes?: boolean
      ): void;
      function getAuthToken(): string | null;
    }

    function initialize(
      baseUrl?: string | null,
      tileUrl?: string | null,
      success?: () => void,
      error?: (error: Error) => void,
      xsrfToken?: string | null,
      project?: string | null
    ): void;
  }

  export = ee;
}

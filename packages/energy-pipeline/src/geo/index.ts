export { GeoExtractor, type GeoExtraction, type GeoExtractorStats } from './geo-extractor.js';
export { GeometryTextError, parsePointText, parseShapeText } from './parse-geometry.js';
export {
  buildChoropleth,
  type RegionFeatureCollection,
  type RegionFeatureProperties,
} from './choropleth.js';

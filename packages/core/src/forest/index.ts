export { Forest, type ForestOptions } from './Forest.js';
export {
  type TreeId,
  type TreeIdCodec,
  BaseTreeId,
  RawTreeId,
  rawTreeIdCodec,
  SlugTreeId,
  slugTreeIdCodec,
  slugSchema,
  equalsById,
  hashById,
} from './TreeId.js';

export {
  type NodeContent,
  type ContentCodec,
  BaseContent,
  defineCodec,
} from './NodeContent.js';
export { RawContent, rawCodec } from './RawContent.js';
export { WeightedContent, weightedCodec, weightSchema } from './WeightedContent.js';

import { BaseContent, type ContentCodec } from './NodeContent.js';

/**
 * Default content: holds the raw text as is.
 */
export class RawContent extends BaseContent {
  constructor(readonly value: string) {
    super();
  }
}

export const rawCodec: ContentCodec<RawContent> = {
  name: 'raw',
  parse: (raw: string) => new RawContent(raw),
};

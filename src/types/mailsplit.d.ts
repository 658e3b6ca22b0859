// mailsplit ships no type declarations; only the surface used here is declared.
declare module 'mailsplit' {
  import { Transform } from 'stream';

  export interface MimeNode {
    type: 'node';
    parentNode: MimeNode | false | undefined;
    /** Lowercased media type, false when the part has no Content-Type */
    contentType: string | false;
    /** Multipart subtype ("mixed", "alternative", ...) or false */
    multipart: string | false;
    charset?: string | false;
    /** Content-Transfer-Encoding decoder for this part's body */
    getDecoder(): Transform;
  }

  export interface BodyChunk {
    type: 'body';
    node: MimeNode;
    value: Buffer;
  }

  export interface DataChunk {
    type: 'data';
    value: Buffer;
  }

  export type SplitterChunk = MimeNode | BodyChunk | DataChunk;

  export class Splitter extends Transform {
    constructor(config?: { ignoreEmbedded?: boolean; maxHeadSize?: number });
  }
}

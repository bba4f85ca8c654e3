/**
 * A single parameter on a property line. `value` is undefined for a bare
 * vCard 2.1 token such as the `HOME` in `TEL;HOME:...`.
 */
export interface VCardParam {
  key: string;
  value?: string;
}

export interface VCardField {
  /** Property group, e.g. `item1` in `item1.TEL:...`. */
  group?: string;
  name: string;
  params: VCardParam[];
  value: string;
}

/** One BEGIN:VCARD ... END:VCARD block; the markers themselves are implicit. */
export interface VCardRecord {
  fields: VCardField[];
}

export type LineEnding = 'lf' | 'crlf';

export interface RenderOptions {
  lineEnding?: LineEnding;
  /** Fold lines longer than this many UTF-8 octets. Unset means never fold. */
  foldWidth?: number;
}

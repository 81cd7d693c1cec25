/**
 * corpCode.xml arrives as a zip archive holding a single XML document.
 */

import { XMLParser } from 'fast-xml-parser';
import { strFromU8, unzipSync } from 'fflate';
import { dartCorpCodeDocumentSchema, type DartCorpCode } from './types';

const parser = new XMLParser({
  ignoreAttributes: true,
  // stock and corp codes carry leading zeros
  parseTagValue: false,
  trimValues: true,
});

export function parseCorpCodeXml(xml: string): DartCorpCode[] {
  const parsed = dartCorpCodeDocumentSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    throw new Error('corpCode document has no <result> element');
  }
  const list = parsed.data.result.list;
  if (!list) return [];
  return Array.isArray(list) ? list : [list];
}

export function extractCorpCodeXml(archive: Uint8Array): string {
  const files = unzipSync(archive);
  const xmlName = Object.keys(files).find((name) => name.toLowerCase().endsWith('.xml'));
  const content = xmlName ? files[xmlName] : undefined;
  if (!content) {
    throw new Error('corpCode archive contains no XML document');
  }
  return strFromU8(content);
}

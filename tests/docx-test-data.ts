import JSZip from 'jszip';
import { parseXml, type XmlNode } from '../src/core/xml';

export const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';

const WORD_MAIN_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml';

export interface WordFileSpec {
  /** Inner XML of w:body */
  body: string;
  /** dcterms:modified in docProps/core.xml; no core part when absent */
  modified?: string;
  /** Entries written as given and expected to pass through untouched */
  extraEntries?: Record<string, string | Uint8Array>;
  /** Content type of the main part override */
  mainContentType?: string;
  /** Leave word/document.xml out of the package */
  omitDocument?: boolean;
}

export function documentXml(body: string): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:document xmlns:w="${W_NS}"><w:body>${body}<w:sectPr/></w:body></w:document>`;
}

export async function generateWordFile(spec: WordFileSpec): Promise<Buffer> {
  const zip = new JSZip();

  const coreOverride =
    spec.modified !== undefined
      ? '<Override PartName="/docProps/core.xml" ContentType="application/vnd.openxmlformats-package.core-properties+xml"/>'
      : '';

  zip.file(
    '[Content_Types].xml',
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
  <Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
  <Default Extension="xml" ContentType="application/xml"/>
  <Default Extension="png" ContentType="image/png"/>
  <Override PartName="/word/document.xml" ContentType="${spec.mainContentType ?? WORD_MAIN_CONTENT_TYPE}"/>
  ${coreOverride}
</Types>`
  );

  zip.file(
    '_rels/.rels',
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
  <Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>
</Relationships>`
  );

  if (!spec.omitDocument) {
    zip.file('word/document.xml', documentXml(spec.body));
  }

  if (spec.modified !== undefined) {
    zip.file(
      'docProps/core.xml',
      `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<cp:coreProperties xmlns:cp="http://schemas.openxmlformats.org/package/2006/metadata/core-properties" xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:dcterms="http://purl.org/dc/terms/" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance"><dc:creator>Test Writer</dc:creator><dcterms:modified xsi:type="dcterms:W3CDTF">${spec.modified}</dcterms:modified></cp:coreProperties>`
    );
  }

  for (const [path, content] of Object.entries(spec.extraEntries ?? {})) {
    zip.file(path, content);
  }

  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

export async function readEntry(data: Buffer, path: string): Promise<Uint8Array | null> {
  const zip = await JSZip.loadAsync(data);
  const file = zip.file(path);
  return file ? file.async('uint8array') : null;
}

/**
 * Parse a standalone w:p element (namespace declared on it)
 */
export function parseParagraph(inner: string): XmlNode {
  return parseXml(`<w:p xmlns:w="${W_NS}">${inner}</w:p>`)[0];
}

// Small WordprocessingML builders for fixtures. Text is written as given and
// must not need escaping.

export function run(text: string, rPr = ''): string {
  return `<w:r>${rPr}<w:t xml:space="preserve">${text}</w:t></w:r>`;
}

export function insertion(text: string, attrs = ''): string {
  return `<w:ins${attrs}>${run(text)}</w:ins>`;
}

export function deletion(text: string, attrs = ''): string {
  return `<w:del${attrs}><w:r><w:delText xml:space="preserve">${text}</w:delText></w:r></w:del>`;
}

export function markerAttrs(id: string, author: string, date: string): string {
  return ` w:id="${id}" w:author="${author}" w:date="${date}"`;
}

export function paragraph(...content: string[]): string {
  return `<w:p>${content.join('')}</w:p>`;
}

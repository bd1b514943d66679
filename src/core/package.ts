/**
 * OOXML Package handling utilities
 *
 * Office documents are ZIP archives containing XML parts. Parts are read and
 * replaced through jszip; entries that are not replaced are written back with
 * their original content.
 */

import JSZip from 'jszip';
import { parseXml, buildXml, addXmlDeclaration, getTagName, getChildren, getAttributes, type XmlNode } from './xml';
import { DocumentFormatError, errorMessage } from './errors';

export interface OoxmlPackage {
  zip: JSZip;
  contentTypes: ContentTypes;
  /** File type determined from content types */
  fileType: 'word' | 'excel' | 'powerpoint' | 'unknown';
}

/**
 * Content types from [Content_Types].xml
 */
export interface ContentTypes {
  defaults: Map<string, string>;
  overrides: Map<string, string>;
}

export async function openPackage(
  data: Buffer | Uint8Array | ArrayBuffer
): Promise<OoxmlPackage> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (err) {
    throw new DocumentFormatError(
      'INVALID_ARCHIVE',
      `Not a valid OOXML package: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  const contentTypesXml = await zip.file('[Content_Types].xml')?.async('string');
  if (!contentTypesXml) {
    throw new DocumentFormatError('MISSING_PART', 'Invalid OOXML package: missing [Content_Types].xml');
  }

  const contentTypes = parseContentTypes(contentTypesXml);
  const fileType = determineFileType(contentTypes);

  return { zip, contentTypes, fileType };
}

/**
 * Parse [Content_Types].xml
 *
 * With preserveOrder the structure is:
 * [ { Types: [ { Default: [], ':@': { '@_Extension': '...', '@_ContentType': '...' } } ] } ]
 */
function parseContentTypes(xml: string): ContentTypes {
  const defaults = new Map<string, string>();
  const overrides = new Map<string, string>();

  for (const node of parseXml(xml, '[Content_Types].xml')) {
    if (getTagName(node) !== 'Types') continue;

    for (const child of getChildren(node)) {
      const attrs = getAttributes(child);
      const type = attrs['@_ContentType'];
      if (!type) continue;

      const tagName = getTagName(child);
      if (tagName === 'Default' && attrs['@_Extension']) {
        defaults.set(attrs['@_Extension'], type);
      } else if (tagName === 'Override' && attrs['@_PartName']) {
        overrides.set(attrs['@_PartName'], type);
      }
    }
  }

  return { defaults, overrides };
}

function determineFileType(
  contentTypes: ContentTypes
): 'word' | 'excel' | 'powerpoint' | 'unknown' {
  for (const [, contentType] of contentTypes.overrides) {
    if (contentType.includes('wordprocessingml')) return 'word';
    if (contentType.includes('spreadsheetml')) return 'excel';
    if (contentType.includes('presentationml')) return 'powerpoint';
  }
  return 'unknown';
}

export async function getPartAsString(
  pkg: OoxmlPackage,
  partPath: string
): Promise<string | null> {
  const file = pkg.zip.file(partPath);
  if (!file) return null;
  return file.async('string');
}

export async function getPartAsXml(
  pkg: OoxmlPackage,
  partPath: string
): Promise<XmlNode[] | null> {
  const content = await getPartAsString(pkg, partPath);
  if (content === null) return null;
  return parseXml(content, partPath);
}

/**
 * Replace a part with serialized XML nodes. The entry keeps its position in
 * the archive; every other entry is untouched.
 */
export function setPartFromXml(
  pkg: OoxmlPackage,
  partPath: string,
  nodes: XmlNode | XmlNode[]
): void {
  pkg.zip.file(partPath, addXmlDeclaration(buildXml(nodes)));
}

export async function savePackage(pkg: OoxmlPackage): Promise<Buffer> {
  return pkg.zip.generateAsync({
    type: 'nodebuffer',
    compression: 'DEFLATE',
    compressionOptions: { level: 9 },
  });
}

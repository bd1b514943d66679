/**
 * Word document handling utilities
 *
 * Loading, saving and paragraph access for .docx packages. Only the main
 * document part is parsed; every other entry stays as jszip holds it.
 */

import {
  openPackage,
  getPartAsXml,
  getPartAsString,
  setPartFromXml,
  savePackage,
  type OoxmlPackage,
} from '../core/package';
import { getTagName, getChildren, findChild, type XmlNode } from '../core/xml';
import { DocumentFormatError } from '../core/errors';
import { WML, MAIN_DOCUMENT_PART, CORE_PROPERTIES_PART } from '../core/namespaces';

/**
 * Represents a Word document (.docx)
 */
export interface WordDocument {
  /** The underlying OOXML package */
  package: OoxmlPackage;
  /** The main document part (word/document.xml) */
  mainDocument: XmlNode[];
  /** Core properties (author, date, etc.) */
  coreProperties?: CoreProperties;
}

/**
 * Core document properties
 */
export interface CoreProperties {
  creator?: string;
  lastModifiedBy?: string;
  created?: string;
  modified?: string;
}

/**
 * Load a Word document from a buffer
 */
export async function loadWordDocument(
  data: Buffer | Uint8Array | ArrayBuffer
): Promise<WordDocument> {
  const pkg = await openPackage(data);

  if (pkg.fileType !== 'word') {
    throw new DocumentFormatError('NOT_WORD', `Not a Word document (package type: ${pkg.fileType})`);
  }

  const mainDocument = await getPartAsXml(pkg, MAIN_DOCUMENT_PART);
  if (!mainDocument) {
    throw new DocumentFormatError('MISSING_PART', `Invalid Word document: missing ${MAIN_DOCUMENT_PART}`);
  }

  const coreProperties = await loadCoreProperties(pkg);

  return {
    package: pkg,
    mainDocument,
    coreProperties,
  };
}

/**
 * Load core properties from docProps/core.xml
 */
async function loadCoreProperties(pkg: OoxmlPackage): Promise<CoreProperties | undefined> {
  const coreXml = await getPartAsString(pkg, CORE_PROPERTIES_PART);
  if (!coreXml) return undefined;

  const props: CoreProperties = {};

  // Simple regex extraction for core properties
  const creatorMatch = coreXml.match(/<dc:creator>([^<]*)<\/dc:creator>/);
  if (creatorMatch) props.creator = creatorMatch[1];

  const lastModifiedByMatch = coreXml.match(/<cp:lastModifiedBy>([^<]*)<\/cp:lastModifiedBy>/);
  if (lastModifiedByMatch) props.lastModifiedBy = lastModifiedByMatch[1];

  const createdMatch = coreXml.match(/<dcterms:created[^>]*>([^<]*)<\/dcterms:created>/);
  if (createdMatch) props.created = createdMatch[1];

  const modifiedMatch = coreXml.match(/<dcterms:modified[^>]*>([^<]*)<\/dcterms:modified>/);
  if (modifiedMatch) props.modified = modifiedMatch[1];

  return props;
}

/**
 * Save a Word document to a buffer. Only word/document.xml is regenerated.
 */
export async function saveWordDocument(doc: WordDocument): Promise<Buffer> {
  setPartFromXml(doc.package, MAIN_DOCUMENT_PART, doc.mainDocument);

  return savePackage(doc.package);
}

/**
 * Get the document body element
 */
export function getDocumentBody(doc: WordDocument): XmlNode | null {
  for (const node of doc.mainDocument) {
    if (getTagName(node) === WML.document) {
      return findChild(node, WML.body);
    }
  }
  return null;
}

/**
 * Paragraphs that are direct children of w:body, in document order.
 * Table cells, text boxes and headers are not included.
 */
export function getBodyParagraphs(doc: WordDocument): XmlNode[] {
  const body = getDocumentBody(doc);
  if (!body) return [];

  return getChildren(body).filter((child) => getTagName(child) === WML.paragraph);
}

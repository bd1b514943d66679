/**
 * WordprocessingML qualified tag and attribute names this package walks.
 *
 * fast-xml-parser keeps prefixes as written, so tags are matched by their
 * conventional `w:` prefixed names, which Word always emits for the main
 * document part.
 */

export const WML = {
  document: 'w:document',
  body: 'w:body',
  paragraph: 'w:p',
  paragraphProperties: 'w:pPr',
  run: 'w:r',
  runProperties: 'w:rPr',
  text: 'w:t',
  deletedText: 'w:delText',
  insertion: 'w:ins',
  deletion: 'w:del',
  moveTo: 'w:moveTo',
  moveFrom: 'w:moveFrom',
  hyperlink: 'w:hyperlink',
  smartTag: 'w:smartTag',
  customXml: 'w:customXml',
  simpleField: 'w:fldSimple',
  structuredTag: 'w:sdt',
  structuredTagContent: 'w:sdtContent',
} as const;

/** Attributes carried by w:ins / w:del */
export const REVISION_ATTRS = {
  author: 'w:author',
  date: 'w:date',
  id: 'w:id',
} as const;

export const XML_SPACE = 'xml:space';

export const MAIN_DOCUMENT_PART = 'word/document.xml';
export const CORE_PROPERTIES_PART = 'docProps/core.xml';

export { extractLatexCode } from './extract';
export { detectContentType } from './classify';
export { validateLatex, type LatexValidation } from './validate';
export {
  DOCUMENT_PACKAGES,
  createFullDocument,
  wrapEquation,
  wrapTable,
  type FullDocumentOptions,
} from './format';

import { createRequire } from 'node:module';
import type PdfParse from 'pdf-parse';

const require = createRequire(import.meta.url);

// The package entry point runs a self-test when loaded without a parent module.
const pdfParse: typeof PdfParse = require('pdf-parse/lib/pdf-parse.js');

export default pdfParse;

// The package entry point runs a self-test when loaded without a parent module;
// the library file it wraps is imported directly and shares its types.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdfParse = require('pdf-parse');
  export = pdfParse;
}

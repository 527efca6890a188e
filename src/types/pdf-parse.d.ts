// The package entry point runs a self-test when loaded as an ES module import,
// so the library file is imported directly. It has the same signature.
declare module 'pdf-parse/lib/pdf-parse.js' {
    import pdfParse from 'pdf-parse';
    export default pdfParse;
}

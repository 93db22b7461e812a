// The package root runs a debug harness when loaded as an ES module; the
// library entry point carries the same API.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdf from "pdf-parse";
  export default pdf;
}

/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
fieldgen - constants from record field names v${VERSION}

USAGE:
  fieldgen --record <name> [options]
  fieldgen --gen "<options>" [--gen "<options>" ...]
  fieldgen [--config fieldgen.json]

GLOBAL OPTIONS:
  -h, --help                    Show help
  -v, --version                 Show version
  -V, --verbose                 Verbose output
  -q, --quiet                   Suppress progress output
  -c, --config <file>           Config file path (default: nearest fieldgen.json)
  --gen <options>               One request's options as a single string; repeatable

REQUEST OPTIONS:
  --record <name>               Interface, class or type alias to read fields from (required)
  --src-dir <dir>               Directory containing the record (default: .)
  --project <name>              tsconfig project to load when the directory has several
  --tests                       Include *.test.ts and *.spec.ts sources
  --tag <key>                   JSDoc tag whose value names each constant
  --tag-regex <regex>           First capture group of this regex, applied to the tag value
  --prefix <prefix>             Base name of the constants (default: [tag]Field)
  --style <style>               alias, typed or generic (default: plain strings)
  --export                      Export the generated names
  --include-record-name         Prefix the base name with the record name
  --include-unexported-fields   Include private and #private fields
  --iter                        Add an all() method listing every value
  --out-dir <dir>               Output directory (default: .)
  --out-file <file>             Output file (default: <record>_<base>.generated.ts)
  --out-module <name>           Module name written to the file (default: output directory name)
  --dry-run                     Print the generated file instead of writing it

EXAMPLES:
  fieldgen --record User --tag db --export
  fieldgen --record User --tag json --style typed --iter --out-dir src/generated
  fieldgen --gen "--record User --tag db" --gen "--record Order --tag db"
`);
};

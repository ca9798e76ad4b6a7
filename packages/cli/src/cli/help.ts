/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
ffigen - host-language bindings for native libraries v${VERSION}

USAGE:
  ffigen <command> [options]

COMMANDS:
  init [dir]                Create ffigen.json and a sample IR document
  generate                  Generate bindings into the output directory
  check                     Exit with status 4 if generated files are out of date

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             List every file written
  -q, --quiet               Suppress progress output
  -c, --config <file>       Config file path (default: nearest ffigen.json)

GENERATE/CHECK OPTIONS:
  -b, --backend <id>        Host backend: csharp or js
  -i, --ir <file>           IR document (default: ir/library.json)
  -o, --out <dir>           Output directory (default: generated)
  -f, --feature <name>      Activate a feature (repeatable)
  -t, --target <abi>        ABI target: x86_64, aarch64, x86 or wasm32
  -n, --namespace <ns>      C# namespace of the generated types
  --force                   Write into a directory ffigen did not create

EXAMPLES:
  ffigen init --backend csharp
  ffigen generate
  ffigen generate --backend js --out web/native
  ffigen check --feature tracing
`);
};

/**
 * @sigdoc/cli
 *
 * sigdoc command-line interface.
 *
 * This package is a CLI tool only - it has no public API exports.
 * Use it via the command line:
 *
 *   sigdoc check src/
 *   sigdoc check src/ --verbose --names main
 *   sigdoc check app.py --json
 *
 * The CLI entry point is src/bin/sigdoc.ts
 */

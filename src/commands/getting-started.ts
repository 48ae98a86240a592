import { Command } from 'commander';
import { CASE_STYLES } from '../text/case-renderer.js';

export const gettingStartedCommand = new Command('getting-started')
  .description('Show getting started guide')
  .action(() => {
    console.log(`
Getting Started with textkit

textkit runs small, pure text transformations from the command line.

━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

## Discover operations

   $ textkit ops list                     # All operations
   $ textkit ops describe convert-case    # Arguments and schema

## Run an operation

Arguments can be passed three ways (highest priority first):

   $ echo '{"text":"myVarName"}' | textkit run tokenize --stdin
   $ textkit run convert-case --json '{"text":"my var","style":"PascalCase"}'
   $ textkit run convert-case --text "myVarName123" --style snake_case

String arguments take the next word as-is, even one starting with "-".
--key=value works for any argument:

   $ textkit run find-replace --text "a-b" --find - --replace +
   $ textkit run reverse --text=-abc

Load the text argument from a file with -f:

   $ textkit run word-count -f notes.md
   $ textkit run sort-lines -f names.txt --ascending false

Case styles: ${CASE_STYLES.join(', ')}
Any other style returns the text unchanged.

## Output

   --output-format text   Plain result (default)
   --output-format json   { success, operation, result }
   --output-format raw    Result value as JSON

━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

## Environment

   TEXTKIT_DEBUG=1|2            Debug logging to stderr
   TEXTKIT_QUIET=1              Only results and errors
   TEXTKIT_VERBOSE=1            Everything
   TEXTKIT_MAX_INPUT_BYTES=N    Cap for --stdin and --file input (default 10 MiB)
`);
  });

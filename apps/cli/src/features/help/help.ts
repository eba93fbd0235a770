import type { Command } from 'commander';

export const HELP_TEXT = `An expense recording system

Commands:

add AMOUNT MEMO [DATE] - record a new expense
clear - delete all expenses
list - list all expenses
delete NUMBER - remove expense with id NUMBER
search QUERY - list expenses with a matching memo field`;

/**
 * Print the usage text to stdout.
 */
export function printUsage(): void {
  console.log(HELP_TEXT);
}

/**
 * Route every help path to the same text: `help`, `--help`, no command and
 * an unknown command all print it and exit 0.
 */
export function registerHelpCommand(program: Command): void {
  program
    .argument('[command]')
    .allowUnknownOption()
    .allowExcessArguments()
    .configureHelp({ formatHelp: () => `${HELP_TEXT}\n` })
    .action(() => {
      printUsage();
    });

  program
    .command('help')
    .description('show usage information')
    .allowExcessArguments()
    .action(() => {
      printUsage();
    });
}

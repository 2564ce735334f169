// CHANGE: Static texts of the divination table
// PURITY: CORE
// INVARIANT: Constants only

export const PROMPT = "\ndivination table >>> ";

export const WELCOME_MESSAGE = `
  ☰ ☱ ☲ ☳
  ☴ ☵ ☶ ☷   yijing-table

An I Ching divination table for the command line.

- Type 'h' or 'help' to see available commands.
- Type 'q' or 'quit' to exit.
`;

export const HELP_MESSAGE = `
I Ching divination table commands:

  g / get               - Cast a new original hexagram
  c / change <Position> - Derive the changing hexagram from the given
    yao positions (1-6). For example: c 1,3,5 or change 2 4 6.
  s / show              - Show current hexagrams
  clear / reset         - Clear the divination table
  h / help              - Show this help message
  q / quit / exit       - Leave the divination table

Old lines are marked: x = old yin, o = old yang. Only old lines can change.
`;

export const CHANGE_USAGE: readonly string[] = [
	"Usage: c <Yao position> or change <Yao position>",
	"For example: c 1,3,5 or change 2 4 6",
];

export const NO_ORIGINAL =
	"Please get an original hexagram first using 'g' command.";
export const NO_HEXAGRAM =
	"No hexagram available. Use 'g' to generate an original hexagram.";
export const NO_NUMBERS = "No valid numbers found.";
export const NO_CHANGEABLE = "No changeable Yao. Remain the original hexagram.";
export const CLEARED = "Divination table has been cleared.";
export const GOODBYE = "Return to terminal...";
export const END_OF_INPUT = "\nExit the divination table.";
export const UNKNOWN_HINT = "Type 'h' for help.";

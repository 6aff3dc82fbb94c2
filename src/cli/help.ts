/**
 * @fileoverview Detailed help text for provenance-audit CLI commands
 */

const HELP_TEXT = {
  main: `
provenance-audit - Read-only diagnostic for AI code waste signals

USAGE:
    provenance-audit <command> [options]

COMMANDS:
    analyze             Scan a repository and write a diagnostic report
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    --verbose           Enable debug logging on stderr

EXIT CODES:
    0                   Report written
    1                   Analysis, history or report failure
    2                   Invalid argument or configuration

EXAMPLES:
    provenance-audit analyze --repo ./service
    provenance-audit analyze --runtime runtime.json --cost-per-invocation 0.0004

For more information on a specific command, run:
    provenance-audit help <command>
`,

  analyze: `
provenance-audit analyze - Scan a repository and write a diagnostic report

USAGE:
    provenance-audit analyze [options]

OPTIONS:
    --repo <path>                   Repository path to analyze (default: .)
    --runtime <file>                Runtime evidence JSON file
    --time-window-days <n>          Runtime evidence window in days (default: 90)
    --cost-per-invocation <n>       Cost per invocation for annualized estimates (default: 0)
    --ai-threshold <n>              Minimum AI probability for a provenance signal (default: 0.65)
    --dup-threshold <n>             High-confidence duplication threshold (default: 0.9)
    --dup-medium-threshold <n>      Medium-confidence duplication threshold (default: 0.75)
    --include-medium-duplicates     Report medium-confidence duplicate pairs too
    --min-dup-body-statements <n>   Minimum body statements for duplication (default: 3)
    --min-dup-signature-chars <n>   Minimum canonical signature length (default: 0)
    --include-tests                 Include files under tests/ directories
    --no-git-evidence               Skip git blame and log evidence
    --currency <code>               Currency label for cost output (default: USD)
    --format <markdown|json>        Report format (default: markdown)
    --output <path>                 Report path (default: reports/diagnostic.md or .json)
    --history-db <path>             SQLite database for run history and trends
    --config <path>                 Config file (default: .provenance-audit.yml in the repo)
    --verbose                       Enable debug logging on stderr

CONFIGURATION:
    Flags override PROVENANCE_AUDIT_* environment variables, which override
    the config file, which overrides built-in defaults. Config file keys use
    camelCase names, for example:

        dupThreshold: 0.92
        includeTests: true
        historyDbPath: .provenance-audit/history.db

EXAMPLES:
    provenance-audit analyze
    provenance-audit analyze --repo ../billing --format json --output out/billing.json
    provenance-audit analyze --runtime runtime.json --history-db history.db
`,

  help: `
provenance-audit help - Show help information

USAGE:
    provenance-audit help [command]
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(command: string): command is HelpTopic {
  return Object.hasOwn(HELP_TEXT, command);
}

export function getCommandHelp(command?: string): string {
  return command && isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  if (command && !isHelpTopic(command)) {
    console.log(`Unknown command: ${command}`);
  }
  console.log(getCommandHelp(command));
}

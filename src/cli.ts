#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { resolve } from 'node:path';
import { existsSync, writeFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { SqlServerAdvisor } from './core/advisor.js';
import { parseEnvironment } from './core/capabilities/environment.js';
import { CAPABILITY_CATEGORIES } from './core/capabilities/schema.js';
import { isAdvisorError, isLoadError } from './core/errors.js';
import { CARDINALITY_HINTS, ROW_COUNT_ESTIMATES } from './core/facts/schema.js';
import { isOneOf } from './core/rules/domains.js';
import { toJson } from './core/report/toJson.js';
import { toText } from './core/report/toText.js';
import type { AdvisorReport, OutputFormat } from './core/report/reportTypes.js';

/** Exit codes. */
const EXIT_OK = 0;
const EXIT_NO_ANSWER = 1;
const EXIT_CLI_ERROR = 2;
const EXIT_LOAD_ERROR = 3;
const EXIT_INTERNAL_ERROR = 4;

const OUTPUT_FORMATS = ['json', 'text'] as const;

const COMMANDS = ['construct', 'fragmentation', 'merge', 'capability', 'capabilities', 'rules'] as const;
type Command = (typeof COMMANDS)[number];

/** Options that only make sense for one command. */
const COMMAND_OPTIONS: Readonly<Record<Command, readonly string[]>> = {
  construct: ['cardinality', 'recursive', 'correlated', 'tvf', 'optional', 'reuse'],
  fragmentation: ['percent'],
  merge: ['branches', 'audit', 'rows'],
  capability: ['name', 'env'],
  capabilities: ['env', 'category'],
  rules: ['rule-set'],
};

/** Thrown for bad command-line usage; reported with EXIT_CLI_ERROR. */
class UsageError extends Error {}

function printUsage(): void {
  process.stdout.write(
    `Usage: sqlserver-advisor <command> [options]

Commands:
  construct             Recommend CTE, subquery or APPLY for a query shape
    --cardinality <c>     Result cardinality: scalar | set (required)
    --recursive           The query walks a hierarchy
    --correlated          The subquery references outer columns
    --tvf                 The query invokes a table-valued function
    --optional            The applied relation may be absent for an outer row
    --reuse <n>           Times the intermediate result is referenced (default: 0)
  fragmentation         Recommend an index maintenance action
    --percent <x>         Average fragmentation percent, 0-100 (required)
  merge                 Recommend MERGE or UPDATE + INSERT for an upsert
    --branches <n>        Number of conditional WHEN branches (required)
    --audit               Row-level audit of changes is required
    --rows <r>            Estimated row count: small | large (default: small)
  capability            Resolve a capability in an environment
    --name <name>         Capability name (required)
    --env <env>           on-prem | azure-iaas | managed-instance (default: all)
  capabilities          List capabilities
    --env <env>           Only rows for this environment
    --category <c>        indexing | backup | high_availability | security | platform
  rules                 List rules in evaluation order
    --rule-set <id>       Only this rule set

Options:
  --rules <path>        Rule source JSON (default: bundled data/rules.json)
  --capabilities <path> Capability matrix JSON (default: bundled data/capabilities.json)
  --format <fmt>        Output format: json | text (default: json)
  --out <path>          Write output to file instead of stdout
  --pretty              Pretty-print JSON output
  --help                Show this help message
`,
  );
}

/** Every option the CLI accepts; command-specific ones are checked against COMMAND_OPTIONS. */
const CLI_OPTIONS = {
  rules: { type: 'string' },
  capabilities: { type: 'string' },
  format: { type: 'string', default: 'json' },
  out: { type: 'string' },
  pretty: { type: 'boolean', default: false },
  help: { type: 'boolean', default: false },
  cardinality: { type: 'string' },
  recursive: { type: 'boolean' },
  correlated: { type: 'boolean' },
  tvf: { type: 'boolean' },
  optional: { type: 'boolean' },
  reuse: { type: 'string' },
  percent: { type: 'string' },
  branches: { type: 'string' },
  audit: { type: 'boolean' },
  rows: { type: 'string' },
  name: { type: 'string' },
  env: { type: 'string' },
  category: { type: 'string' },
  'rule-set': { type: 'string' },
} as const;

function parseCliArgs(argv: string[] | undefined) {
  return parseArgs({ args: argv, allowPositionals: true, options: CLI_OPTIONS, strict: true });
}

export function main(argv?: string[]): number {
  let args: ReturnType<typeof parseCliArgs>;

  try {
    args = parseCliArgs(argv);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : 'Invalid arguments';
    process.stderr.write(`Error: ${detail}. Use --help for usage.\n`);
    return EXIT_CLI_ERROR;
  }

  const { values, positionals } = args;

  if (values.help === true) {
    printUsage();
    return EXIT_OK;
  }

  const [command, ...extra] = positionals;
  if (command === undefined) {
    process.stderr.write('Error: Missing command. Use --help for usage.\n');
    return EXIT_CLI_ERROR;
  }
  if (!isOneOf(COMMANDS, command)) {
    process.stderr.write(`Error: Unknown command "${command}". Use --help for usage.\n`);
    return EXIT_CLI_ERROR;
  }
  if (extra.length > 0) {
    process.stderr.write(`Error: Unexpected argument "${extra.join(' ')}". Use --help for usage.\n`);
    return EXIT_CLI_ERROR;
  }

  const misplaced = Object.keys(values).find((key) =>
    Object.entries(COMMAND_OPTIONS).some(([other, keys]) => other !== command && keys.includes(key))
    && !COMMAND_OPTIONS[command].includes(key),
  );
  if (misplaced !== undefined) {
    process.stderr.write(`Error: Option --${misplaced} does not apply to "${command}".\n`);
    return EXIT_CLI_ERROR;
  }

  const format = values.format ?? 'json';
  if (!isOneOf(OUTPUT_FORMATS, format)) {
    process.stderr.write(`Error: Invalid format "${format}". Must be "json" or "text".\n`);
    return EXIT_CLI_ERROR;
  }
  const outputFormat: OutputFormat = format;

  // Resolve source paths if provided
  const rulesPath = values.rules !== undefined ? resolve(values.rules) : undefined;
  if (rulesPath !== undefined && !existsSync(rulesPath)) {
    process.stderr.write(`Error: Rules file not found: ${rulesPath}\n`);
    return EXIT_CLI_ERROR;
  }
  const capabilitiesPath = values.capabilities !== undefined ? resolve(values.capabilities) : undefined;
  if (capabilitiesPath !== undefined && !existsSync(capabilitiesPath)) {
    process.stderr.write(`Error: Capabilities file not found: ${capabilitiesPath}\n`);
    return EXIT_CLI_ERROR;
  }

  let advisor: SqlServerAdvisor;
  try {
    advisor = SqlServerAdvisor.load({ rulesPath, capabilitiesPath });
  } catch (error: unknown) {
    if (!isLoadError(error)) {
      throw error;
    }
    process.stderr.write(`Error: Failed to load advisor data. ${error.message}\n`);
    return EXIT_LOAD_ERROR;
  }

  let report: AdvisorReport;
  try {
    report = runCommand(advisor, command, values);
  } catch (error: unknown) {
    if (error instanceof UsageError) {
      process.stderr.write(`Error: ${error.message}\n`);
      return EXIT_CLI_ERROR;
    }
    if (!isAdvisorError(error)) {
      throw error;
    }
    process.stderr.write(`Error: ${error.message}\n`);
    return error.code === 'INVALID_FACT' ? EXIT_CLI_ERROR : EXIT_NO_ANSWER;
  }

  const output = outputFormat === 'json' ? toJson(report, values.pretty === true) : toText(report);

  // Write output
  if (values.out !== undefined) {
    writeFileSync(resolve(values.out), output, 'utf-8');
  } else {
    process.stdout.write(output);
    process.stdout.write('\n');
  }

  return EXIT_OK;
}

/** Parsed option values, as parseArgs returns them. */
interface OptionValues {
  readonly cardinality?: string | undefined;
  readonly recursive?: boolean | undefined;
  readonly correlated?: boolean | undefined;
  readonly tvf?: boolean | undefined;
  readonly optional?: boolean | undefined;
  readonly reuse?: string | undefined;
  readonly percent?: string | undefined;
  readonly branches?: string | undefined;
  readonly audit?: boolean | undefined;
  readonly rows?: string | undefined;
  readonly name?: string | undefined;
  readonly env?: string | undefined;
  readonly category?: string | undefined;
  readonly 'rule-set'?: string | undefined;
}

function runCommand(advisor: SqlServerAdvisor, command: Command, values: OptionValues): AdvisorReport {
  switch (command) {
    case 'construct': {
      const advice = advisor.recommendConstruct({
        resultCardinalityHint: parseChoice(required(values.cardinality, '--cardinality', command), CARDINALITY_HINTS, '--cardinality'),
        needsRecursion: values.recursive === true,
        isCorrelated: values.correlated === true,
        invokesTableValuedFunction: values.tvf === true,
        relationIsOptional: values.optional === true,
        reuseCount: values.reuse !== undefined ? parseNumber(values.reuse) : 0,
      });
      return { kind: 'recommendation', title: 'Construct Selection', advice };
    }
    case 'fragmentation': {
      const advice = advisor.recommendFragmentationAction({
        fragmentationPercent: parseNumber(required(values.percent, '--percent', command)),
      });
      return { kind: 'recommendation', title: 'Fragmentation Action', advice };
    }
    case 'merge': {
      const advice = advisor.recommendMergeStrategy({
        conditionalBranchCount: parseNumber(required(values.branches, '--branches', command)),
        needsRowLevelAudit: values.audit === true,
        estimatedRowCount: values.rows !== undefined ? parseChoice(values.rows, ROW_COUNT_ESTIMATES, '--rows') : 'SMALL',
      });
      return { kind: 'recommendation', title: 'MERGE vs UPDATE + INSERT', advice };
    }
    case 'capability': {
      const name = required(values.name, '--name', command);
      if (values.env === undefined) {
        const statuses = advisor.compareCapability(name);
        return { kind: 'capability-comparison', name: statuses[0]?.name ?? name, statuses };
      }
      return { kind: 'capability', status: advisor.resolveCapability(name, values.env) };
    }
    case 'capabilities': {
      const statuses = advisor.listCapabilities({
        environment: values.env !== undefined ? parseEnvironment(values.env) : undefined,
        category: values.category !== undefined ? parseChoice(values.category, CAPABILITY_CATEGORIES, '--category') : undefined,
      });
      return { kind: 'capability-list', statuses };
    }
    case 'rules':
      return { kind: 'rule-list', ruleSets: advisor.listRules(values['rule-set']) };
  }
}

function required(value: string | undefined, flag: string, command: Command): string {
  if (value === undefined) {
    throw new UsageError(`"${command}" requires ${flag}.`);
  }
  return value;
}

/** Match a flag value against upper-case constants, case-insensitively. */
function parseChoice<T extends string>(value: string, choices: readonly T[], flag: string): T {
  const upper = value.trim().toUpperCase().replace(/-/g, '_');
  if (!isOneOf(choices, upper)) {
    throw new UsageError(
      `Invalid ${flag} value "${value}". Must be one of ${choices.map((c) => c.toLowerCase()).join(', ')}.`,
    );
  }
  return upper;
}

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/** Anything but a plain decimal becomes NaN, which fact validation rejects. */
function parseNumber(value: string): number {
  const text = value.trim();
  return DECIMAL.test(text) ? Number(text) : Number.NaN;
}

/** Run `main`, reporting any unexpected failure with EXIT_INTERNAL_ERROR. */
export function run(argv?: string[]): number {
  try {
    return main(argv);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    process.stderr.write(`Error: ${detail}\n`);
    return EXIT_INTERNAL_ERROR;
  }
}

if (process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  process.exitCode = run();
}

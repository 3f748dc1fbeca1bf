import { Command, CommanderError, InvalidArgumentError as CommanderArgumentError, Option } from 'commander';
import { type CostReportConfig, createCostExplorerClient, createEc2Client, loadConfig } from './config';
import { type CostExplorerSender, DEFAULT_LOOKBACK_DAYS, downloadCostData, resolveDateRange } from './cost-fetcher';
import { formatSummaryAsPlainText } from './html-formatter';
import { downloadInventory, type Ec2Sender } from './inventory';
import { generateCostReport } from './report';
import type { Granularity } from './types';

export type ClientFactory = (config: Pick<CostReportConfig, 'region' | 'profile'>) => CostExplorerSender;

export type Ec2ClientFactory = (config: Pick<CostReportConfig, 'region' | 'profile'>) => Ec2Sender;

interface ReportCommandOptions {
  inDir: string;
  outDir: string;
}

interface FetchCommandOptions {
  days: number;
  start?: string;
  end?: string;
  granularity: Granularity;
  outDir: string;
  region: string;
  profile?: string;
}

interface InventoryCommandOptions {
  regions: string[];
  outDir: string;
  pretty: boolean;
  region: string;
  profile?: string;
}

function parseRegionList(value: string): string[] {
  return [...new Set(value.split(',').map((region) => region.trim()).filter(Boolean))];
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new CommanderArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseGranularity(value: string): Granularity {
  const granularity = value.toUpperCase();
  if (granularity === 'DAILY' || granularity === 'MONTHLY') {
    return granularity;
  }
  throw new CommanderArgumentError('Expected DAILY or MONTHLY.');
}

export function createProgram(
  config: CostReportConfig = loadConfig(),
  createClient: ClientFactory = createCostExplorerClient,
  createEc2: Ec2ClientFactory = createEc2Client
): Command {
  const program = new Command();

  program
    .name('ec2-cost-report')
    .description('Download EC2 costs from AWS Cost Explorer and build an HTML cost report')
    .version('0.1.0')
    .exitOverride();

  program
    .command('report')
    .description('Build the HTML report and charts from downloaded cost data')
    .option('--in-dir <path>', 'Directory holding the cost JSON files', config.dataDir)
    .option('--out-dir <path>', 'Directory for the report and images', config.reportDir)
    .action((options: ReportCommandOptions) => {
      const artifacts = generateCostReport({ inDir: options.inDir, outDir: options.outDir });
      console.log(formatSummaryAsPlainText(artifacts));
    });

  program
    .command('fetch')
    .description('Download the daily total and per-instance-type EC2 cost series')
    .option('--days <n>', 'Days to look back from today', parsePositiveInt, DEFAULT_LOOKBACK_DAYS)
    .option('--start <date>', 'Start date in YYYY-MM-DD format (inclusive)')
    .option('--end <date>', 'End date in YYYY-MM-DD format (inclusive)')
    .addOption(
      new Option('--granularity <granularity>', 'DAILY or MONTHLY').argParser(parseGranularity).default('DAILY')
    )
    .option('--out-dir <path>', 'Directory for the JSON files', config.dataDir)
    .option('--region <region>', 'Cost Explorer region', config.region)
    .option('--profile <name>', 'Named AWS profile', config.profile)
    .action(async (options: FetchCommandOptions) => {
      const range = resolveDateRange({ days: options.days, start: options.start, end: options.end });
      const client = createClient({ region: options.region, profile: options.profile });
      const result = await downloadCostData(client, {
        range,
        granularity: options.granularity,
        outDir: options.outDir,
      });
      console.log(`Range: ${range.start} -> ${range.end} (end exclusive)`);
      console.log(`Generated: ${result.totalPath}`);
      console.log(`Generated: ${result.byTypePath}`);
    });

  program
    .command('inventory')
    .description('Collect EC2 instances with their VPC names across regions into JSON')
    .option('--regions <list>', 'Comma-separated regions (default: every enabled region)', parseRegionList, [])
    .option('--out-dir <path>', 'Directory for the inventory JSON', config.dataDir)
    .option('--pretty', 'Indent the JSON output', false)
    .option('--region <region>', 'Region used to list the enabled regions', config.region)
    .option('--profile <name>', 'Named AWS profile', config.profile)
    .action(async (options: InventoryCommandOptions) => {
      const result = await downloadInventory((region) => createEc2({ region, profile: options.profile }), {
        homeRegion: options.region,
        regions: options.regions,
        outDir: options.outDir,
        pretty: options.pretty,
      });
      console.log(`Regions: ${result.regionCount}, instances: ${result.instanceCount}`);
      console.log(`Generated: ${result.inventoryPath}`);
    });

  return program;
}

/** Runs the CLI and resolves to the process exit code. */
export async function run(argv: string[], programFactory: () => Command = () => createProgram()): Promise<number> {
  try {
    await programFactory().parseAsync(argv);
    return 0;
  } catch (error) {
    // commander has already printed its own usage errors
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

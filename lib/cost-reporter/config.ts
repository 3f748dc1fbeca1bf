import { CostExplorerClient } from '@aws-sdk/client-cost-explorer';
import { EC2Client } from '@aws-sdk/client-ec2';
import { fromIni } from '@aws-sdk/credential-providers';
import { z } from 'zod';

const EnvSchema = z.object({
  // Cost Explorer is served from us-east-1 regardless of where resources run
  COST_EXPLORER_REGION: z.string().min(1).default('us-east-1'),
  AWS_PROFILE: z.string().min(1).optional(),
  COST_DATA_DIR: z.string().min(1).default('.'),
  COST_REPORT_DIR: z.string().min(1).default('output'),
});

export interface CostReportConfig {
  region: string;
  profile?: string;
  dataDir: string;
  reportDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CostReportConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    region: result.data.COST_EXPLORER_REGION,
    profile: result.data.AWS_PROFILE,
    dataDir: result.data.COST_DATA_DIR,
    reportDir: result.data.COST_REPORT_DIR,
  };
}

/**
 * Uses the named profile when one is configured, otherwise the SDK's default
 * credential chain.
 */
export function createCostExplorerClient(config: Pick<CostReportConfig, 'region' | 'profile'>): CostExplorerClient {
  if (config.profile) {
    return new CostExplorerClient({
      region: config.region,
      credentials: fromIni({ profile: config.profile }),
    });
  }

  return new CostExplorerClient({
    region: config.region,
  });
}

export function createEc2Client(config: Pick<CostReportConfig, 'region' | 'profile'>): EC2Client {
  return new EC2Client({
    region: config.region,
    ...(config.profile ? { credentials: fromIni({ profile: config.profile }) } : {}),
  });
}

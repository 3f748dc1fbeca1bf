import {
  DescribeInstancesCommand,
  DescribeRegionsCommand,
  DescribeVpcsCommand,
  type EC2Client,
  type Tag,
} from '@aws-sdk/client-ec2';
import path from 'path';
import { Ec2RequestError } from './errors';
import { INVENTORY_FILE, writeJsonFile } from './storage';
import type { Ec2Inventory, InstanceRecord } from './types';

export type Ec2Sender = Pick<EC2Client, 'send'>;

export type Ec2SenderFactory = (region: string) => Ec2Sender;

export interface InventoryOptions {
  // region queried for the list of enabled regions
  homeRegion: string;
  regions?: string[];
  now?: Date;
}

export interface DownloadInventoryOptions extends InventoryOptions {
  outDir: string;
  pretty: boolean;
}

export interface DownloadInventoryResult {
  inventoryPath: string;
  regionCount: number;
  instanceCount: number;
}

function tagValue(tags: Tag[] | undefined, key: string): string | null {
  return tags?.find((tag) => tag.Key === key)?.Value ?? null;
}

async function withRegion<T>(region: string, request: () => Promise<T>): Promise<T> {
  try {
    return await request();
  } catch (error) {
    throw new Ec2RequestError(region, error);
  }
}

/** Enabled regions of the account, sorted by name. */
export async function listRegions(client: Ec2Sender, homeRegion: string): Promise<string[]> {
  const response = await withRegion(homeRegion, () =>
    client.send(new DescribeRegionsCommand({ AllRegions: false }))
  );

  return (response.Regions ?? [])
    .map((region) => region.RegionName)
    .filter((name): name is string => Boolean(name))
    .sort();
}

export async function describeVpcNames(client: Ec2Sender, region: string): Promise<Map<string, string | null>> {
  const response = await withRegion(region, () => client.send(new DescribeVpcsCommand({})));
  const names = new Map<string, string | null>();

  for (const vpc of response.Vpcs ?? []) {
    if (vpc.VpcId) {
      names.set(vpc.VpcId, tagValue(vpc.Tags, 'Name'));
    }
  }

  return names;
}

export async function collectRegionInstances(client: Ec2Sender, region: string): Promise<InstanceRecord[]> {
  const vpcNames = await describeVpcNames(client, region);
  const instances: InstanceRecord[] = [];
  let nextToken: string | undefined;

  do {
    const response = await withRegion(region, () =>
      client.send(new DescribeInstancesCommand({ NextToken: nextToken }))
    );

    for (const reservation of response.Reservations ?? []) {
      for (const instance of reservation.Instances ?? []) {
        const vpcId = instance.VpcId ?? null;
        instances.push({
          instanceId: instance.InstanceId ?? null,
          name: tagValue(instance.Tags, 'Name'),
          instanceType: instance.InstanceType ?? null,
          state: instance.State?.Name ?? null,
          privateIp: instance.PrivateIpAddress ?? null,
          publicIp: instance.PublicIpAddress ?? null,
          vpcId,
          vpcName: vpcId ? vpcNames.get(vpcId) ?? null : null,
          region,
        });
      }
    }

    nextToken = response.NextToken;
  } while (nextToken);

  console.log(`Found ${instances.length} instances in ${region}`);
  return instances;
}

export async function buildInventory(createClient: Ec2SenderFactory, options: InventoryOptions): Promise<Ec2Inventory> {
  const regions =
    options.regions && options.regions.length > 0
      ? options.regions
      : await listRegions(createClient(options.homeRegion), options.homeRegion);

  console.log(`Collecting EC2 inventory for ${regions.length} regions`);

  const perRegion = await Promise.all(regions.map((region) => collectRegionInstances(createClient(region), region)));

  return {
    generatedAt: (options.now ?? new Date()).toISOString(),
    regions,
    instances: perRegion.flat(),
  };
}

export async function downloadInventory(
  createClient: Ec2SenderFactory,
  options: DownloadInventoryOptions
): Promise<DownloadInventoryResult> {
  const inventory = await buildInventory(createClient, options);
  const inventoryPath = writeJsonFile(path.join(options.outDir, INVENTORY_FILE), inventory, options.pretty);

  console.log(`Inventory saved: ${inventory.instances.length} instances to ${inventoryPath}`);

  return {
    inventoryPath,
    regionCount: inventory.regions.length,
    instanceCount: inventory.instances.length,
  };
}

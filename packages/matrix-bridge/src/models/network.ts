import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { readYaml } from '../utils';
import { BRIDGE_TYPES, type BridgeType } from './bridge-record';
import { MissingParameterError, UnsupportedNetworkError } from './errors';
import { ARTIFACT_KINDS } from './pairing';

export const DEFAULT_NETWORKS_PATH = fileURLToPath(
  new URL('../../config/networks.yaml', import.meta.url)
);

const TEARDOWN_PAUSE_MS = 5_000;

const TeardownStepSchema = z.object({
  command: z.string().min(1),
  pauseMs: z.number().int().nonnegative().default(TEARDOWN_PAUSE_MS),
});

export const NetworkProfileSchema = z.object({
  displayName: z.string(),
  /** name of the caller-supplied value substituted for `{param}` */
  parameter: z.string().optional(),
  cancelCommand: z.string().optional(),
  loginCommand: z.string().min(1),
  monitorProbe: z.string().optional(),
  artifacts: z.array(z.enum(ARTIFACT_KINDS)).min(1),
  successMarkers: z.array(z.string().min(1)).min(1),
  failurePatterns: z.array(z.string().min(1)),
  postLoginCommands: z.array(z.string()).default([]),
  resyncCommands: z.array(z.string()).default([]),
  resyncDelayMs: z.number().int().nonnegative().default(2_000),
  teardown: z.array(TeardownStepSchema),
  leaveRoomOnDisconnect: z.boolean().default(false),
});

export const NetworksFileSchema = z.object({
  disconnectionPatterns: z.array(z.string().min(1)),
  networks: z.object({
    whatsapp: NetworkProfileSchema.optional(),
    signal: NetworkProfileSchema.optional(),
    telegram: NetworkProfileSchema.optional(),
    messenger: NetworkProfileSchema.optional(),
  }),
});

export type NetworksFile = z.infer<typeof NetworksFileSchema>;

export type NetworkProfile = z.infer<typeof NetworkProfileSchema> & {
  network: BridgeType;
};

export const renderCommand = (profile: NetworkProfile, template: string, param?: string) => {
  if (!template.includes('{param}')) return template;

  if (!param) throw new MissingParameterError(profile.parameter ?? 'param');

  return template.replaceAll('{param}', param);
};

const includesAny = (body: string, patterns: readonly string[]) => {
  const lower = body.toLowerCase();
  return patterns.find((pattern) => lower.includes(pattern.toLowerCase()));
};

export const matchesSuccess = (profile: NetworkProfile, body: string) =>
  profile.successMarkers.some((marker) => body.includes(marker));

/** Returns the failure pattern found in `body`, case-insensitively. */
export const matchesFailure = (profile: NetworkProfile, body: string) =>
  includesAny(body, profile.failurePatterns);

export class NetworkCatalog {
  constructor(private readonly file: NetworksFile) {}

  public static parse(contents: unknown): NetworkCatalog {
    return new NetworkCatalog(NetworksFileSchema.parse(contents));
  }

  public find(network: BridgeType): NetworkProfile | undefined {
    const profile = this.file.networks[network];
    return profile && { ...profile, network };
  }

  public get(network: BridgeType): NetworkProfile {
    const profile = this.find(network);
    if (!profile) throw new UnsupportedNetworkError(network);
    return profile;
  }

  public get networks(): BridgeType[] {
    return BRIDGE_TYPES.filter((network) => this.file.networks[network] !== undefined);
  }

  public isDisconnection(body: string) {
    return includesAny(body, this.file.disconnectionPatterns) !== undefined;
  }
}

export const loadNetworkCatalog = async (path: string = DEFAULT_NETWORKS_PATH) =>
  NetworkCatalog.parse(await readYaml(path));

import { CommandError, type ExecResult, type Executor } from "./executor";
import { ProfileAlreadyExistsError, ProfileNotFoundError } from "./errors";
import type {
  BootConfig,
  FetchOptions,
  HardwareProfile,
  NetworkInterface,
  Partition,
  PartitionUpdate,
  ProfileStore,
  SoftwareProfile,
} from "./profiles";

const NOT_FOUND = /not found|does not exist/i;
const ALREADY_EXISTS = /already exists/i;

/**
 * ProfileStore backed by the cluster's profile-management CLI. Every call
 * is a single argv (no shell); `show` commands print JSON.
 */
export class CliProfileStore implements ProfileStore {
  constructor(private readonly exe: Executor, private readonly cli = "profilectl") {}

  async getSoftwareProfile(name: string, options: FetchOptions = {}): Promise<SoftwareProfile> {
    const args = ["software", "show", name, "--json"];
    if (options.detail) args.push("--detail");
    const res = await this.call(args);
    if (res.code !== 0) {
      if (NOT_FOUND.test(res.stderr)) throw new ProfileNotFoundError("software", name);
      this.fail(args, res);
    }
    return parseSoftwareProfile(parseJson(res.stdout, `software profile '${name}'`));
  }

  async deleteSoftwareProfile(name: string): Promise<void> {
    await this.mutate(["software", "delete", name]);
  }

  async copyProfile(source: string, target: string): Promise<void> {
    const args = ["software", "copy", source, target];
    const res = await this.call(args);
    if (res.code === 0) return;
    if (ALREADY_EXISTS.test(res.stderr)) throw new ProfileAlreadyExistsError(target);
    if (NOT_FOUND.test(res.stderr)) throw new ProfileNotFoundError("software", source);
    this.fail(args, res);
  }

  async updateProfileBoot(name: string, boot: BootConfig): Promise<void> {
    await this.mutate([
      "software", "boot", name,
      "--kernel", boot.kernel,
      "--initrd", boot.initrd,
      "--params", boot.kernelParams,
    ]);
  }

  async addPartition(profile: string, p: Partition): Promise<void> {
    await this.mutate([
      "partition", "add", profile,
      "--name", p.name,
      "--mount", p.mountPoint,
      "--device", String(p.device),
      "--disk-size", String(p.diskSize),
      "--size", String(p.size),
      "--fstype", p.fsType,
      p.preserve ? "--preserve" : "--no-preserve",
      p.bootLoader ? "--bootloader" : "--no-bootloader",
    ]);
  }

  async updatePartition(profile: string, name: string, update: PartitionUpdate): Promise<void> {
    await this.mutate([
      "partition", "update", profile, name,
      "--disk-size", String(update.diskSize),
      "--size", String(update.size),
    ]);
  }

  async getHardwareProfile(name: string, options: FetchOptions = {}): Promise<HardwareProfile> {
    const args = ["hardware", "show", name, "--json"];
    if (options.detail) args.push("--detail");
    const res = await this.call(args);
    if (res.code !== 0) {
      if (NOT_FOUND.test(res.stderr)) throw new ProfileNotFoundError("hardware", name);
      this.fail(args, res);
    }
    return parseHardwareProfile(parseJson(res.stdout, `hardware profile '${name}'`));
  }

  async setProfileMapping(software: string, hardware: string): Promise<void> {
    await this.mutate(["mapping", "set", software, hardware]);
  }

  private call(args: string[]): Promise<ExecResult> {
    return this.exe.run([this.cli, ...args], { allowNonZeroExit: true });
  }

  private async mutate(args: string[]): Promise<void> {
    const res = await this.call(args);
    if (res.code !== 0) this.fail(args, res);
  }

  private fail(args: string[], res: ExecResult): never {
    throw new CommandError([this.cli, ...args], res);
  }
}

type JsonObject = Record<string, unknown>;

function isObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseJson(text: string, what: string): JsonObject {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw new Error(`Unable to parse JSON for ${what}`);
  }
  if (!isObject(data)) throw new Error(`Expected a JSON object for ${what}`);
  return data;
}

function str(o: JsonObject, key: string, what: string, fallback?: string): string {
  const v = o[key] ?? fallback;
  if (typeof v !== "string") throw new Error(`${what}: '${key}' must be a string`);
  return v;
}

function num(o: JsonObject, key: string, what: string): number {
  const v = o[key];
  if (typeof v !== "number" || !Number.isFinite(v)) throw new Error(`${what}: '${key}' must be a number`);
  return v;
}

function bool(o: JsonObject, key: string, what: string): boolean {
  const v = o[key] ?? false;
  if (typeof v !== "boolean") throw new Error(`${what}: '${key}' must be a boolean`);
  return v;
}

function list(o: JsonObject, key: string, what: string): JsonObject[] {
  const v = o[key] ?? [];
  if (!Array.isArray(v) || !v.every(isObject)) throw new Error(`${what}: '${key}' must be a list of objects`);
  return v;
}

function parseSoftwareProfile(o: JsonObject): SoftwareProfile {
  const what = "software profile";
  return {
    name: str(o, "name", what),
    boot: {
      kernel: str(o, "kernel", what, ""),
      initrd: str(o, "initrd", what, ""),
      kernelParams: str(o, "kernelParams", what, ""),
    },
    partitions: list(o, "partitions", what).map((p): Partition => ({
      name: str(p, "name", "partition"),
      mountPoint: str(p, "mountPoint", "partition", ""),
      device: num(p, "device", "partition"),
      diskSize: num(p, "diskSize", "partition"),
      size: num(p, "size", "partition"),
      fsType: str(p, "fsType", "partition", ""),
      preserve: bool(p, "preserve", "partition"),
      bootLoader: bool(p, "bootLoader", "partition"),
    })),
  };
}

function parseHardwareProfile(o: JsonObject): HardwareProfile {
  const what = "hardware profile";
  return {
    name: str(o, "name", what),
    installType: str(o, "installType", what, ""),
    interfaces: list(o, "interfaces", what).map((n): NetworkInterface => {
      const ip = n.ip;
      if (ip !== undefined && ip !== null && typeof ip !== "string") {
        throw new Error("interface: 'ip' must be a string");
      }
      return {
        name: str(n, "name", "interface"),
        role: str(n, "role", "interface", ""),
        ...(typeof ip === "string" && ip ? { ip } : {}),
      };
    }),
  };
}

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, type DeployConfig } from "../src/lib/config";
import { ProfileNotFoundError } from "../src/lib/errors";
import type { Logger } from "../src/lib/log";
import type {
  BootConfig,
  HardwareProfile,
  Partition,
  PartitionUpdate,
  ProfileStore,
  SoftwareProfile,
} from "../src/lib/profiles";

export type StoreCall = { op: keyof ProfileStore; args: unknown[] };

/** In-process stand-in for the profile tool. */
export class MemoryProfileStore implements ProfileStore {
  public calls: StoreCall[] = [];
  public software = new Map<string, SoftwareProfile>();
  public hardware = new Map<string, HardwareProfile>();
  public mappings: Array<[string, string]> = [];
  public failures: Partial<Record<keyof ProfileStore, Error>> = {};
  /** Runs before each call is served. */
  public beforeCall?: (op: keyof ProfileStore, args: unknown[]) => void;

  private record(op: keyof ProfileStore, args: unknown[]) {
    this.calls.push({ op, args });
    if (this.beforeCall) this.beforeCall(op, args);
    const failure = this.failures[op];
    if (failure) throw failure;
  }

  ops(): Array<keyof ProfileStore> {
    return this.calls.map((c) => c.op);
  }

  private requireSoftware(name: string): SoftwareProfile {
    const p = this.software.get(name);
    if (!p) throw new ProfileNotFoundError("software", name);
    return p;
  }

  async getSoftwareProfile(name: string, options?: { detail?: boolean }): Promise<SoftwareProfile> {
    this.record("getSoftwareProfile", [name, options]);
    return structuredClone(this.requireSoftware(name));
  }

  async deleteSoftwareProfile(name: string): Promise<void> {
    this.record("deleteSoftwareProfile", [name]);
    this.requireSoftware(name);
    this.software.delete(name);
  }

  async copyProfile(source: string, target: string): Promise<void> {
    this.record("copyProfile", [source, target]);
    const src = this.requireSoftware(source);
    if (this.software.has(target)) throw new Error(`Software profile '${target}' already exists`);
    this.software.set(target, { ...structuredClone(src), name: target });
  }

  async updateProfileBoot(name: string, boot: BootConfig): Promise<void> {
    this.record("updateProfileBoot", [name, boot]);
    this.requireSoftware(name).boot = { ...boot };
  }

  async addPartition(profile: string, partition: Partition): Promise<void> {
    this.record("addPartition", [profile, partition]);
    const p = this.requireSoftware(profile);
    if (p.partitions.some((x) => x.name === partition.name)) throw new Error(`Partition '${partition.name}' already exists`);
    p.partitions.push({ ...partition });
  }

  async updatePartition(profile: string, name: string, update: PartitionUpdate): Promise<void> {
    this.record("updatePartition", [profile, name, update]);
    const part = this.requireSoftware(profile).partitions.find((x) => x.name === name);
    if (!part) throw new Error(`Partition '${name}' not found`);
    Object.assign(part, update);
  }

  async getHardwareProfile(name: string, options?: { detail?: boolean }): Promise<HardwareProfile> {
    this.record("getHardwareProfile", [name, options]);
    const hw = this.hardware.get(name);
    if (!hw) throw new ProfileNotFoundError("hardware", name);
    return structuredClone(hw);
  }

  async setProfileMapping(software: string, hardware: string): Promise<void> {
    this.record("setProfileMapping", [software, hardware]);
    if (!this.mappings.some(([s, h]) => s === software && h === hardware)) this.mappings.push([software, hardware]);
  }
}

export class RecordingLogger implements Logger {
  public lines: string[] = [];
  debug(s: string) { this.lines.push(`[DEBUG] ${s}`); }
  info(s: string) { this.lines.push(`[INFO] ${s}`); }
  warn(s: string) { this.lines.push(`[WARN] ${s}`); }
  error(s: string) { this.lines.push(`[ERROR] ${s}`); }
}

export function emptyProfile(name: string, partitions: Partition[] = []): SoftwareProfile {
  return { name, boot: { kernel: "vmlinuz", initrd: "initrd.img", kernelParams: "" }, partitions };
}

export function deployHardware(name: string, ip = "10.1.0.1"): HardwareProfile {
  return {
    name,
    installType: "image-deploy",
    interfaces: [
      { name: "eth1", role: "public", ip: "192.168.5.9" },
      { name: "eth0", role: "provisioning", ip },
    ],
  };
}

export function partedDump(device: string, sectors: string): string {
  return [
    "Model: Virtio Block Device (virtblk)",
    `Disk /dev/${device}: ${sectors}`,
    "Sector size (logical/physical): 512B/512B",
    "Partition Table: msdos",
    "Disk Flags: ",
    "",
    "Number  Start  End        Size       Type     File system  Flags",
    " 1      2048s  15624999s  15622952s  primary  ext4         boot",
    "",
  ].join("\n");
}

export function makeImageRoot(): { root: string; cleanup: () => void } {
  const root = mkdtempSync(join(tmpdir(), "image-root-"));
  return { root, cleanup: () => rmSync(root, { recursive: true, force: true }) };
}

export function writeImage(root: string, name: string, files: Record<string, string>): string {
  const dir = join(root, name);
  mkdirSync(dir, { recursive: true });
  for (const [file, content] of Object.entries(files)) writeFileSync(join(dir, file), content);
  return dir;
}

export function testConfig(imageRoot: string): DeployConfig {
  return { ...loadConfig({}), imageRoot };
}

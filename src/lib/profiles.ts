export type Partition = {
  name: string;
  mountPoint: string;
  device: number;
  /** MB */
  diskSize: number;
  /** MB */
  size: number;
  fsType: string;
  preserve: boolean;
  bootLoader: boolean;
};

export type PartitionUpdate = Pick<Partition, "diskSize" | "size">;

export type BootConfig = {
  kernel: string;
  initrd: string;
  kernelParams: string;
};

export type SoftwareProfile = {
  name: string;
  boot: BootConfig;
  partitions: Partition[];
};

export type NetworkInterface = {
  name: string;
  role: string;
  ip?: string;
};

export type HardwareProfile = {
  name: string;
  installType: string;
  interfaces: NetworkInterface[];
};

export type FetchOptions = { detail?: boolean };

/**
 * Records owned by the cluster's profile-management tool. Lookups of
 * absent profiles reject with `ProfileNotFoundError`; everything else
 * propagates the tool's failure unchanged.
 */
export interface ProfileStore {
  getSoftwareProfile(name: string, options?: FetchOptions): Promise<SoftwareProfile>;
  deleteSoftwareProfile(name: string): Promise<void>;
  copyProfile(source: string, target: string): Promise<void>;
  updateProfileBoot(name: string, boot: BootConfig): Promise<void>;
  addPartition(profile: string, partition: Partition): Promise<void>;
  updatePartition(profile: string, name: string, update: PartitionUpdate): Promise<void>;
  getHardwareProfile(name: string, options?: FetchOptions): Promise<HardwareProfile>;
  setProfileMapping(software: string, hardware: string): Promise<void>;
}

export const ROOT_PARTITION = "root";

export function findPartition(profile: SoftwareProfile, name: string): Partition | undefined {
  return profile.partitions.find((p) => p.name === name);
}

export function provisioningIp(hw: HardwareProfile): string | undefined {
  const nic = hw.interfaces.find((i) => i.role === "provisioning");
  return nic?.ip || undefined;
}

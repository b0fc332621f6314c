import type { DeployConfig } from "./config";
import { ROOT_PARTITION, findPartition, type BootConfig, type ProfileStore, type SoftwareProfile } from "./profiles";

export type GeometryTarget = {
  deviceName: string;
  imageName: string;
  roundedSizeMB: number;
  provisioningIp: string;
};

export type BootParams = {
  bootMode: string;
  deployMode: string;
  fetchUrl: string;
  installerIp: string;
  preRun: string;
  imageName: string;
  targetDevice: string;
};

type BootSettings = Pick<DeployConfig, "installType" | "archivePath" | "postCloneScript">;

export function buildBootParams(target: Omit<GeometryTarget, "roundedSizeMB">, config: BootSettings): BootParams {
  const ip = target.provisioningIp;
  const scriptFile = config.postCloneScript.slice(config.postCloneScript.lastIndexOf("/") + 1);
  return {
    bootMode: "live",
    deployMode: config.installType,
    fetchUrl: `tftp://${ip}${config.archivePath}`,
    installerIp: ip,
    preRun: `busybox tftp -g -r ${config.postCloneScript} -l /tmp/${scriptFile} ${ip} && sh /tmp/${scriptFile}`,
    imageName: target.imageName,
    targetDevice: target.deviceName,
  };
}

export function renderKernelParams(p: BootParams): string {
  return [
    `boot=${p.bootMode}`,
    `deploy_mode=${p.deployMode}`,
    `fetch=${p.fetchUrl}`,
    `installer_ip=${p.installerIp}`,
    `ocs_prerun="${p.preRun}"`,
    "locales=",
    "keyboard-layouts=",
    'ocs_live_keymap="NONE"',
    'ocs_lang="en_US.UTF-8"',
    'ocs_live_batch="yes"',
    `image_name=${p.imageName}`,
    `target_device=${p.targetDevice}`,
  ].join(" ");
}

function buildBootConfig(target: GeometryTarget, config: DeployConfig): BootConfig {
  return {
    kernel: config.kernel,
    initrd: config.initrd,
    kernelParams: renderKernelParams(buildBootParams(target, config)),
  };
}

/**
 * Points the profile's boot configuration at the image and sizes its root
 * partition. Only "root" is touched: updated in place when present
 * (last write wins), added otherwise.
 */
export async function applyGeometry(
  store: ProfileStore,
  profile: SoftwareProfile,
  target: GeometryTarget,
  config: DeployConfig
): Promise<void> {
  await store.updateProfileBoot(profile.name, buildBootConfig(target, config));

  const size = target.roundedSizeMB;
  if (findPartition(profile, ROOT_PARTITION)) {
    await store.updatePartition(profile.name, ROOT_PARTITION, { diskSize: size, size });
    return;
  }
  await store.addPartition(profile.name, {
    name: ROOT_PARTITION,
    mountPoint: "/",
    device: config.rootDevice,
    diskSize: size,
    size,
    fsType: config.rootFsType,
    preserve: false,
    bootLoader: false,
  });
}

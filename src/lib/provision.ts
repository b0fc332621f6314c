import { join } from "node:path";
import type { DeployConfig } from "./config";
import {
  ConfigurationError,
  InvalidRequestError,
  NoProvisioningInterfaceError,
  ProfileAlreadyExistsError,
  ProfileNotFoundError,
  errorMessage,
} from "./errors";
import { bytesToGiB } from "./format";
import { deriveGeometry, imageDirExists } from "./geometry";
import type { Logger } from "./log";
import { provisioningIp, type HardwareProfile, type ProfileStore, type SoftwareProfile } from "./profiles";
import { applyGeometry } from "./reconcile";

export type ProvisionRequest = {
  imageName: string;
  softwareProfile: string;
  hardwareProfile: string;
  /** Clone this profile into `softwareProfile` first. */
  sourceSoftwareProfile?: string;
  /** Replace an existing target when cloning. */
  force?: boolean;
};

export type ProvisionDeps = {
  store: ProfileStore;
  config: DeployConfig;
  log: Logger;
};

export function validateImageName(name: string): void {
  if (!name) throw new InvalidRequestError("Missing image name");
  if (name === "." || name === ".." || !/^[^\s/\\"']+$/.test(name)) {
    throw new InvalidRequestError(`Invalid image name: ${name}`);
  }
}

async function probeSoftwareProfile(store: ProfileStore, name: string): Promise<SoftwareProfile | undefined> {
  try {
    return await store.getSoftwareProfile(name);
  } catch (e) {
    if (e instanceof ProfileNotFoundError) return undefined;
    throw e;
  }
}

function checkInstallType(hw: HardwareProfile, expected: string): void {
  if (hw.installType === expected) return;
  throw new ConfigurationError(
    `Hardware profile '${hw.name}' is not configured for image deployment`,
    [
      `Hardware profile '${hw.name}' uses install type '${hw.installType || "(none)"}'.`,
      `Image deployment requires install type '${expected}'.`,
      `Switch the hardware profile to '${expected}' or pick one that already uses it, then run this command again.`,
    ]
  );
}

async function cloneProfile(deps: ProvisionDeps, source: string, target: string, force: boolean): Promise<void> {
  const { store, log } = deps;
  await store.getSoftwareProfile(source);

  if (await probeSoftwareProfile(store, target)) {
    if (!force) {
      throw new InvalidRequestError(`Software profile '${target}' already exists; use --force to replace it`);
    }
    log.warn(`Deleting existing software profile '${target}' (--force)`);
    await store.deleteSoftwareProfile(target);
  }

  // Another actor may have created the target since the probe above.
  if (await probeSoftwareProfile(store, target)) throw new ProfileAlreadyExistsError(target);

  log.info(`Cloning software profile '${source}' to '${target}'`);
  await store.copyProfile(source, target);
}

export async function provision(deps: ProvisionDeps, req: ProvisionRequest): Promise<SoftwareProfile> {
  const { store, config, log } = deps;

  validateImageName(req.imageName);
  const imageDir = join(config.imageRoot, req.imageName);
  if (!imageDirExists(imageDir)) throw new InvalidRequestError(`Image not found: ${imageDir}`);
  if (!req.softwareProfile) throw new InvalidRequestError("Missing software profile name");
  if (!req.hardwareProfile) throw new InvalidRequestError("Missing hardware profile name");
  if (req.sourceSoftwareProfile === req.softwareProfile) {
    throw new InvalidRequestError(`Source and target software profile are both '${req.softwareProfile}'`);
  }

  if (req.sourceSoftwareProfile) {
    await cloneProfile(deps, req.sourceSoftwareProfile, req.softwareProfile, req.force ?? false);
  } else {
    log.info(`Reusing software profile '${req.softwareProfile}'`);
  }
  const profile = await store.getSoftwareProfile(req.softwareProfile, { detail: true });

  const hw = await store.getHardwareProfile(req.hardwareProfile, { detail: true });
  checkInstallType(hw, config.installType);

  try {
    await store.setProfileMapping(profile.name, hw.name);
  } catch (e) {
    log.warn(`Could not map '${profile.name}' to '${hw.name}': ${errorMessage(e)}`);
  }

  const ip = provisioningIp(hw);
  if (!ip) throw new NoProvisioningInterfaceError(hw.name);
  log.debug(`Provisioning IP: ${ip}`);

  const geometry = await deriveGeometry(config.imageRoot, req.imageName);
  log.info(
    `Image '${geometry.imageName}' on ${geometry.deviceName}: ${geometry.sectorCount} sectors, ` +
    `${geometry.sizeMB} MB (${bytesToGiB(geometry.sizeBytes)}), partition size ${geometry.roundedSizeMB} MB`
  );

  await applyGeometry(store, profile, {
    deviceName: geometry.deviceName,
    imageName: geometry.imageName,
    roundedSizeMB: geometry.roundedSizeMB,
    provisioningIp: ip,
  }, config);
  log.info(`Software profile '${profile.name}' updated for image '${geometry.imageName}'`);

  return store.getSoftwareProfile(profile.name, { detail: true });
}

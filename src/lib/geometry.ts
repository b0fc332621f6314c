import { existsSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { ImageNotFoundError, MalformedImageError } from "./errors";

const SECTOR_SIZE = 512n;
const DECIMAL_MB = 1_000_000n;

/** File in the image directory naming the cloned block device. */
const DEVICE_FILE = "disk";

export type ImageGeometry = {
  imageName: string;
  deviceName: string;
  sectorCount: bigint;
  sizeBytes: bigint;
  /** Decimal megabytes, not rounded. Display only. */
  sizeMB: number;
  /** Decimal megabytes rounded up; used for partition sizing. */
  roundedSizeMB: number;
};

function geometryFileName(deviceName: string): string {
  return `${deviceName}-pt.parted`;
}

export function parseDeviceName(text: string): string {
  const first = text.split(/\r?\n/)[0] ?? "";
  return first.trimEnd();
}

/**
 * Sector count from a `parted -s unit s print` dump. Only the first line
 * starting with "Disk " is considered, e.g. `Disk /dev/vda: 15625000s`.
 */
export function parseSectorCount(text: string): bigint {
  const line = text
    .split(/\r?\n/)
    .map((l) => l.trimEnd())
    .find((l) => l.startsWith("Disk "));
  if (line === undefined) throw new MalformedImageError("malformed geometry file");

  const token = line.slice(line.lastIndexOf(" ") + 1);
  if (!token.endsWith("s")) throw new MalformedImageError(`cannot parse sector size '${token}'`);
  const digits = token.slice(0, -1);
  if (!/^\d+$/.test(digits)) throw new MalformedImageError(`unknown sector size/file format '${token}'`);
  return BigInt(digits);
}

export function roundUpToSector(bytes: bigint): bigint {
  return ((bytes + SECTOR_SIZE - 1n) / SECTOR_SIZE) * SECTOR_SIZE;
}

export function roundedSizeMB(sectors: bigint): number {
  const aligned = roundUpToSector(sectors * SECTOR_SIZE);
  const mb = (aligned + DECIMAL_MB - 1n) / DECIMAL_MB;
  if (mb > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new MalformedImageError(`sector count out of range (${sectors})`);
  }
  return Number(mb);
}

export function decimalSizeMB(bytes: bigint): number {
  const whole = bytes / DECIMAL_MB;
  const frac = bytes % DECIMAL_MB;
  return Number(whole) + Number(frac) / 1_000_000;
}

async function readImageFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (e) {
    const reason = e instanceof Error && "code" in e && e.code === "ENOENT" ? "missing descriptor file" : "unreadable descriptor file";
    throw new MalformedImageError(reason, path);
  }
}

export function imageDirExists(imageDir: string): boolean {
  return existsSync(imageDir) && statSync(imageDir).isDirectory();
}

export async function deriveGeometry(imageRoot: string, imageName: string): Promise<ImageGeometry> {
  const imageDir = join(imageRoot, imageName);
  if (!imageDirExists(imageDir)) throw new ImageNotFoundError(imageDir);

  const devicePath = join(imageDir, DEVICE_FILE);
  const deviceName = parseDeviceName(await readImageFile(devicePath));
  if (!deviceName) throw new MalformedImageError("empty device name", devicePath);
  if (deviceName.includes("/")) throw new MalformedImageError(`invalid device name '${deviceName}'`, devicePath);

  const geometryPath = join(imageDir, geometryFileName(deviceName));
  const text = await readImageFile(geometryPath);

  let sectorCount: bigint;
  try {
    sectorCount = parseSectorCount(text);
  } catch (e) {
    if (e instanceof MalformedImageError) throw new MalformedImageError(e.message, geometryPath);
    throw e;
  }

  const sizeBytes = sectorCount * SECTOR_SIZE;
  return {
    imageName,
    deviceName,
    sectorCount,
    sizeBytes,
    sizeMB: decimalSizeMB(sizeBytes),
    roundedSizeMB: roundedSizeMB(sectorCount),
  };
}

export type ProvisionErrorKind =
  | "InvalidRequest"
  | "ImageNotFound"
  | "NotFound"
  | "AlreadyExists"
  | "MalformedImage"
  | "ConfigurationError"
  | "NoProvisioningInterface";

export class ProvisionError extends Error {
  constructor(readonly kind: ProvisionErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidRequestError extends ProvisionError {
  constructor(message: string) {
    super("InvalidRequest", message);
  }
}

export class ImageNotFoundError extends ProvisionError {
  constructor(readonly imageDir: string) {
    super("ImageNotFound", `Image directory not found: ${imageDir}`);
  }
}

export type ProfileKind = "software" | "hardware";

export class ProfileNotFoundError extends ProvisionError {
  constructor(readonly profileKind: ProfileKind, readonly profileName: string) {
    super("NotFound", `${profileKind === "software" ? "Software" : "Hardware"} profile '${profileName}' does not exist`);
  }
}

export class ProfileAlreadyExistsError extends ProvisionError {
  constructor(readonly profileName: string) {
    super("AlreadyExists", `Software profile '${profileName}' already exists`);
  }
}

export class MalformedImageError extends ProvisionError {
  constructor(message: string, readonly file?: string) {
    super("MalformedImage", file ? `${message}: ${file}` : message);
  }
}

/**
 * Hardware profile cannot be used for image deployment. Terminal: the
 * CLI exits with a dedicated code and prints `guidance` for the operator.
 */
export class ConfigurationError extends ProvisionError {
  constructor(message: string, readonly guidance: string[]) {
    super("ConfigurationError", message);
  }
}

export class NoProvisioningInterfaceError extends ProvisionError {
  constructor(readonly hardwareProfile: string) {
    super("NoProvisioningInterface", `Hardware profile '${hardwareProfile}' has no provisioning interface with an IP address`);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

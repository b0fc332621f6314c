export type DeployConfig = {
  imageRoot: string;
  profileCli: string;
  installType: string;
  kernel: string;
  initrd: string;
  archivePath: string;
  postCloneScript: string;
  rootDevice: number;
  rootFsType: string;
  verbose: boolean;
};

type Env = Record<string, string | undefined>;

export function loadConfig(source: Env = process.env): DeployConfig {
  const env = (k: string, d: string) => {
    const v = source[k]?.trim();
    return v ? v : d;
  };

  const rootDevice = Number(env("DEPLOY_ROOT_DEVICE", "1"));
  if (!Number.isInteger(rootDevice) || rootDevice < 0) {
    throw new Error(`DEPLOY_ROOT_DEVICE must be a non-negative integer, got '${source.DEPLOY_ROOT_DEVICE}'`);
  }

  return {
    imageRoot: env("IMAGE_ROOT", "/home/partimag"),
    profileCli: env("PROFILE_CLI", "profilectl"),
    installType: env("DEPLOY_INSTALL_TYPE", "image-deploy"),
    kernel: env("DEPLOY_KERNEL", "vmlinuz-image-deploy"),
    initrd: env("DEPLOY_INITRD", "initrd-image-deploy.img"),
    archivePath: withLeadingSlash(env("DEPLOY_ARCHIVE_PATH", "/image-deploy/filesystem.squashfs")),
    postCloneScript: withLeadingSlash(env("DEPLOY_POST_CLONE_SCRIPT", "/image-deploy/post-clone.sh")),
    rootDevice,
    rootFsType: env("DEPLOY_ROOT_FSTYPE", "ext3"),
    verbose: env("VERBOSE", "0") === "1",
  };
}

function withLeadingSlash(p: string): string {
  return p.startsWith("/") ? p : `/${p}`;
}

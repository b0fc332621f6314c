import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/lib/config";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      imageRoot: "/home/partimag",
      profileCli: "profilectl",
      installType: "image-deploy",
      kernel: "vmlinuz-image-deploy",
      initrd: "initrd-image-deploy.img",
      archivePath: "/image-deploy/filesystem.squashfs",
      postCloneScript: "/image-deploy/post-clone.sh",
      rootDevice: 1,
      rootFsType: "ext3",
      verbose: false,
    });
  });

  it("reads overrides and normalizes paths", () => {
    const c = loadConfig({
      IMAGE_ROOT: "/srv/images",
      PROFILE_CLI: "  /opt/bin/profilectl ",
      DEPLOY_ARCHIVE_PATH: "deploy/fs.squashfs",
      DEPLOY_ROOT_DEVICE: "2",
      DEPLOY_ROOT_FSTYPE: "ext4",
      VERBOSE: "1",
    });
    expect(c.imageRoot).toBe("/srv/images");
    expect(c.profileCli).toBe("/opt/bin/profilectl");
    expect(c.archivePath).toBe("/deploy/fs.squashfs");
    expect(c.rootDevice).toBe(2);
    expect(c.rootFsType).toBe("ext4");
    expect(c.verbose).toBe(true);
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ IMAGE_ROOT: "   " }).imageRoot).toBe("/home/partimag");
  });

  it("rejects an invalid root device index", () => {
    expect(() => loadConfig({ DEPLOY_ROOT_DEVICE: "first" })).toThrow("DEPLOY_ROOT_DEVICE must be a non-negative integer");
    expect(() => loadConfig({ DEPLOY_ROOT_DEVICE: "-1" })).toThrow("DEPLOY_ROOT_DEVICE must be a non-negative integer");
  });
});

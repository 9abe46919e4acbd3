export const CLI_NAME = "snail-harness";

export const DEFAULT_VM_PREFIX = "snail-test";
export const DEFAULT_DISTRIBUTION = "fedora";
export const DEFAULT_SPECS = "fedora:42";

export const SEED_VOLUME_LABEL = "cidata";
export const SEED_VOLUME_FILE = "cloud-init.iso";

export const SNAIL_INSTALL_PATH = "/opt/snail-core";
export const SNAIL_VENV_PATH = "/opt/snail-core/venv";
export const SNAIL_CONFIG_DIR = "/etc/snail-core";
export const SNAIL_CONFIG_PATH = "/etc/snail-core/config.yaml";
export const SNAIL_OUTPUT_DIR = "/var/lib/snail-core";
export const SETUP_SENTINEL_PATH = "/var/lib/snail-core/.setup-complete";

export const REQUIRED_TOOLS = ["virsh", "virt-install", "qemu-img", "genisoimage", "curl", "ssh-keygen"] as const;

// qcow2 header magic: "QFI\xfb"
export const QCOW2_MAGIC = Buffer.from([0x51, 0x46, 0x49, 0xfb]);
export const MIN_IMAGE_BYTES = 1024 * 1024;

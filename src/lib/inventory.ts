import { SNAIL_CONFIG_PATH, SNAIL_INSTALL_PATH, SNAIL_VENV_PATH } from "./constants";
import type { SshSettings } from "./status";
import type { VmStatus } from "./types";

export const INVENTORY_GROUP = "snail_vms";

export interface HostVars {
  ansible_host: string;
  vm_name: string;
}

export interface AnsibleInventory {
  _meta: { hostvars: Record<string, HostVars> };
  all: { children: string[] };
  snail_vms: {
    hosts: string[];
    vars: Record<string, string>;
  };
}

/** Ansible dynamic inventory (`--list` shape). Only running VMs with an address are hosts. */
export function buildInventory(rows: VmStatus[], ssh: SshSettings): AnsibleInventory {
  const inventory: AnsibleInventory = {
    _meta: { hostvars: {} },
    all: { children: [INVENTORY_GROUP] },
    snail_vms: {
      hosts: [],
      vars: {
        ansible_user: ssh.user,
        ansible_ssh_private_key_file: ssh.keyPath,
        ansible_python_interpreter: "/usr/bin/python3",
        snail_install_path: SNAIL_INSTALL_PATH,
        snail_venv_path: SNAIL_VENV_PATH,
        snail_config_path: SNAIL_CONFIG_PATH
      }
    }
  };

  for (const row of rows) {
    if (row.state !== "running" || !row.ip) {
      continue;
    }
    inventory.snail_vms.hosts.push(row.name);
    inventory._meta.hostvars[row.name] = { ansible_host: row.ip, vm_name: row.name };
  }
  return inventory;
}

export function hostVarsFor(rows: VmStatus[], host: string): HostVars | Record<string, never> {
  const row = rows.find((item) => item.name === host);
  return row?.ip ? { ansible_host: row.ip, vm_name: row.name } : {};
}

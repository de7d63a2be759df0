import { execFile } from "node:child_process";
import { readFile } from "node:fs/promises";
import { PlatformUnsupportedError } from "../errors.js";

export type MachineIdentityProbe = () => Promise<string>;

const PROBE_TIMEOUT_MS = 10_000;
const LINUX_ID_PATHS = ["/etc/machine-id", "/var/lib/dbus/machine-id"];

function run(binary: string, args: string[]): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    execFile(binary, args, { timeout: PROBE_TIMEOUT_MS, encoding: "utf-8" }, (error, stdout) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(stdout);
    });
  });
}

async function linuxMachineId(): Promise<string> {
  for (const path of LINUX_ID_PATHS) {
    try {
      const id = (await readFile(path, "utf-8")).trim();
      if (id) return id;
    } catch {
      // try the next location
    }
  }
  throw new PlatformUnsupportedError("linux", "machine-id file not found or empty");
}

async function windowsMachineGuid(): Promise<string> {
  let output: string;
  try {
    output = await run("reg", [
      "query",
      "HKLM\\SOFTWARE\\Microsoft\\Cryptography",
      "/v",
      "MachineGuid",
      "/reg:64",
    ]);
  } catch (err) {
    throw new PlatformUnsupportedError("win32", "registry query for MachineGuid failed", { cause: err });
  }
  const match = /MachineGuid\s+REG_SZ\s+(\S+)/.exec(output);
  if (!match?.[1]) {
    throw new PlatformUnsupportedError("win32", "MachineGuid not present in registry output");
  }
  return match[1];
}

async function macosPlatformUuid(): Promise<string> {
  let output: string;
  try {
    output = await run("ioreg", ["-rd1", "-c", "IOPlatformExpertDevice"]);
  } catch (err) {
    throw new PlatformUnsupportedError("darwin", "ioreg query failed", { cause: err });
  }
  const match = /"IOPlatformUUID"\s*=\s*"([^"]+)"/.exec(output);
  if (!match?.[1]) {
    throw new PlatformUnsupportedError("darwin", "IOPlatformUUID not found in ioreg output");
  }
  return match[1];
}

/** Stable identifier of the current machine; rejects with PlatformUnsupportedError. */
export const machineIdentity: MachineIdentityProbe = async () => {
  switch (process.platform) {
    case "linux":
      return linuxMachineId();
    case "win32":
      return windowsMachineGuid();
    case "darwin":
      return macosPlatformUuid();
    default:
      throw new PlatformUnsupportedError(process.platform, "no identity probe for this platform");
  }
};

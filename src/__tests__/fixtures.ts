/**
 * Shared reference data for tests.
 */

import { MANIFEST_VERSION, type CacheManifest } from "../reference/types.js";

export function sampleManifest(overrides: Partial<CacheManifest> = {}): CacheManifest {
  return {
    version: MANIFEST_VERSION,
    fetchedAt: "2026-01-02T03:04:05.000Z",
    source: "https://malapi.test",
    categories: [
      {
        header: "Injection",
        apis: [
          {
            name: "CreateRemoteThread",
            description: "Creates a thread in another process",
            library: "kernel32.dll",
            documentation: "https://docs.test/createremotethread",
          },
          { name: "VirtualAllocEx", description: "Allocates memory in another process", library: "kernel32.dll" },
          { name: "WriteProcessMemory", library: "kernel32.dll" },
        ],
      },
      {
        header: "Anti-Debugging",
        apis: [
          {
            name: "IsDebuggerPresent",
            description: "Checks for a user-mode debugger",
            library: "kernel32.dll",
            documentation: "https://docs.test/isdebuggerpresent",
          },
          { name: "CheckRemoteDebuggerPresent" },
        ],
      },
      {
        header: "Evasion",
        apis: [
          { name: "VirtualAllocEx", description: "Reserves memory for unpacked code" },
          { name: "Sleep", library: "kernel32.dll" },
        ],
      },
    ],
    ...overrides,
  };
}

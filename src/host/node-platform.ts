import os, { type NetworkInterfaceInfo } from 'node:os'
import type { ConnectivityKind, DeviceInfo, PlatformFamily, PlatformHost } from './types'

const FAMILIES: Partial<Record<NodeJS.Platform, PlatformFamily>> = {
  android: 'android',
  darwin: 'macos',
  linux: 'linux',
  win32: 'windows',
}

export function platformFamilyFor(platform: NodeJS.Platform): PlatformFamily {
  return FAMILIES[platform] ?? 'unknown'
}

const INTERFACE_KINDS: { pattern: RegExp; kind: ConnectivityKind }[] = [
  { pattern: /^(wl|wlan|wifi|wi-fi)/i, kind: 'wifi' },
  { pattern: /^(rmnet|wwan|pdp_ip|ccmni)/i, kind: 'mobile' },
  { pattern: /^(eth|en)/i, kind: 'ethernet' },
  { pattern: /^(tun|utun|wg|ppp)/i, kind: 'vpn' },
  { pattern: /^(bnep|bt-pan)/i, kind: 'bluetooth' },
]

/** Guess the link type from an interface name: `wlan0` → `wifi`. */
export function classifyInterface(name: string): ConnectivityKind {
  return INTERFACE_KINDS.find(({ pattern }) => pattern.test(name))?.kind ?? 'other'
}

/**
 * Connectivity kinds for every interface that has a non-internal address.
 * An empty table reads as `['none']`.
 */
export function connectivityFromInterfaces(
  table: NodeJS.Dict<NetworkInterfaceInfo[]>,
): ConnectivityKind[] {
  const kinds = new Set<ConnectivityKind>()
  for (const [name, addresses] of Object.entries(table)) {
    if (addresses?.some((address) => !address.internal)) {
      kinds.add(classifyInterface(name))
    }
  }
  return kinds.size > 0 ? [...kinds] : ['none']
}

/** Platform host backed by node:os, for scripts, tests and server rendering. */
export const nodePlatformHost: PlatformHost = {
  family() {
    return platformFamilyFor(process.platform)
  },

  async deviceInfo(): Promise<DeviceInfo> {
    return { platform: 'Unknown', info: `${os.type()} ${os.release()} (${os.machine()})` }
  },

  async connectivity() {
    return connectivityFromInterfaces(os.networkInterfaces())
  },
}

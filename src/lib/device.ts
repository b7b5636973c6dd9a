/**
 * Platform, device and connectivity queries.
 *
 * OS lookups go through a PlatformHost. A host that throws or rejects
 * degrades to a sentinel ('unknown' family, Unknown device, offline) and
 * the failure is logged as a warning.
 */
import { nodePlatformHost } from '../host/node-platform'
import {
  isLiveContext,
  type ConnectivityKind,
  type DeviceInfo,
  type PlatformFamily,
  type PlatformHost,
  type UiContext,
} from '../host/types'
import { errorMessage } from './errors'
import { logger, type Logger } from './logger'

const DESKTOP_FAMILIES: readonly PlatformFamily[] = ['windows', 'macos', 'linux']
const ONLINE_KINDS: readonly ConnectivityKind[] = ['wifi', 'mobile', 'ethernet']

export const UNKNOWN_DEVICE: DeviceInfo = { platform: 'Unknown', info: 'unavailable' }

export function createDeviceUtils(host: PlatformHost = nodePlatformHost, log: Logger = logger) {
  function platform(): PlatformFamily {
    try {
      return host.family()
    } catch (err) {
      log.warning(`Platform lookup failed: ${errorMessage(err)}`)
      return 'unknown'
    }
  }

  return {
    platform,

    isAndroid: () => platform() === 'android',
    isIOS: () => platform() === 'ios',
    isWeb: () => platform() === 'web',
    isDesktop: () => DESKTOP_FAMILIES.includes(platform()),
    isMobile: () => {
      const family = platform()
      return family === 'android' || family === 'ios'
    },

    async getDeviceInfo(): Promise<DeviceInfo> {
      try {
        return await host.deviceInfo()
      } catch (err) {
        log.warning(`Device info lookup failed: ${errorMessage(err)}`)
        return UNKNOWN_DEVICE
      }
    },

    /** True when a Wi-Fi, mobile or wired link is up. */
    async hasInternetConnection(): Promise<boolean> {
      try {
        const kinds = await host.connectivity()
        return kinds.some((kind) => ONLINE_KINDS.includes(kind))
      } catch (err) {
        log.warning(`Connectivity check failed: ${errorMessage(err)}`)
        return false
      }
    },
  }
}

export type DeviceUtils = ReturnType<typeof createDeviceUtils>

export const device = createDeviceUtils()

export function screenWidth(ctx: UiContext | null | undefined): number | null {
  return isLiveContext(ctx) ? ctx.mediaQuery().size.width : null
}

export function screenHeight(ctx: UiContext | null | undefined): number | null {
  return isLiveContext(ctx) ? ctx.mediaQuery().size.height : null
}

export function isPortrait(ctx: UiContext | null | undefined): boolean {
  return isLiveContext(ctx) && ctx.mediaQuery().orientation === 'portrait'
}

export function isLandscape(ctx: UiContext | null | undefined): boolean {
  return isLiveContext(ctx) && ctx.mediaQuery().orientation === 'landscape'
}

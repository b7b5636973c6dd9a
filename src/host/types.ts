/**
 * Contracts for the host UI framework and operating system.
 *
 * The helpers in this package never reach a renderer or OS API directly;
 * they go through these capabilities, which the embedding app implements.
 */
import type { ReactElement } from 'react'

export interface Size {
  width: number
  height: number
}

export interface Offset {
  x: number
  y: number
}

/** Unbounded axes use `Infinity` as their max. */
export interface BoxConstraints {
  minWidth: number
  maxWidth: number
  minHeight: number
  maxHeight: number
}

export type Orientation = 'portrait' | 'landscape'

export interface MediaQueryData {
  size: Size
  orientation: Orientation
}

export interface RenderBox {
  readonly constraints: BoxConstraints
  /** False until the box has been laid out. */
  readonly hasSize: boolean
  readonly size: Size
  readonly parent: RenderBox | null
  localToGlobal(point: Offset): Offset
}

export interface OverlayHandle {
  remove(): void
}

export interface Overlay {
  insert(content: ReactElement): OverlayHandle
}

export interface SnackbarMessenger {
  show(content: ReactElement, durationMs: number): void
  hideCurrent(): void
}

export type ModalKind = 'dialog' | 'bottom-sheet'

export interface ModalRequest<T> {
  kind: ModalKind
  /** `close(value)` resolves the modal with `value`. */
  build(close: (value: T) => void): ReactElement
  dismissible: boolean
  enableDrag?: boolean
}

export interface UiContext {
  /** False once the element behind this handle has left the tree. */
  isAttached(): boolean
  mediaQuery(): MediaQueryData
  findRenderBox(): RenderBox | null
  overlay(): Overlay | null
  messenger(): SnackbarMessenger | null
  /** Resolves `null` when the modal is dismissed without a value. */
  showModal<T>(request: ModalRequest<T>): Promise<T | null>
}

/**
 * Narrow to a context that is still attached. A context whose
 * `isAttached()` throws counts as stale.
 */
export function isLiveContext(ctx: UiContext | null | undefined): ctx is UiContext {
  if (!ctx) return false
  try {
    return ctx.isAttached()
  } catch {
    return false
  }
}

export type PlatformFamily = 'android' | 'ios' | 'web' | 'windows' | 'macos' | 'linux' | 'unknown'

export type ConnectivityKind = 'wifi' | 'mobile' | 'ethernet' | 'vpn' | 'bluetooth' | 'other' | 'none'

export type DeviceInfo =
  | { platform: 'Web'; browserName: string; userAgent: string; vendor: string }
  | { platform: 'Android'; brand: string; model: string; device: string; version: string }
  | { platform: 'iOS'; model: string; systemName: string; systemVersion: string }
  | { platform: 'Unknown'; info: string }

export interface PlatformHost {
  family(): PlatformFamily
  deviceInfo(): Promise<DeviceInfo>
  connectivity(): Promise<ConnectivityKind[]>
}

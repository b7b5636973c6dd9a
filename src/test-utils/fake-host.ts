/**
 * In-process stand-ins for the host UI and OS layers.
 */
import type { ReactElement } from 'react'
import type {
  BoxConstraints,
  ConnectivityKind,
  DeviceInfo,
  MediaQueryData,
  ModalRequest,
  Offset,
  Overlay,
  OverlayHandle,
  PlatformFamily,
  PlatformHost,
  RenderBox,
  Size,
  SnackbarMessenger,
  UiContext,
} from '@/host/types'

export class FakeOverlay implements Overlay {
  readonly entries: ReactElement[] = []
  removals = 0

  insert(content: ReactElement): OverlayHandle {
    this.entries.push(content)
    return {
      remove: () => {
        const index = this.entries.indexOf(content)
        if (index === -1) throw new Error('entry already removed')
        this.entries.splice(index, 1)
        this.removals++
      },
    }
  }
}

export class FakeMessenger implements SnackbarMessenger {
  current: { content: ReactElement; durationMs: number } | null = null
  shown = 0
  hidden = 0

  show(content: ReactElement, durationMs: number): void {
    this.current = { content, durationMs }
    this.shown++
  }

  hideCurrent(): void {
    if (this.current) this.hidden++
    this.current = null
  }
}

export interface PendingModal<T = unknown> {
  request: ModalRequest<T>
  element: ReactElement
  resolve(value: T): void
  dismiss(): void
}

export interface FakeBoxInit {
  constraints?: Partial<BoxConstraints>
  size?: Size
  origin?: Offset
  parent?: RenderBox | null
}

export function fakeBox({ constraints, size, origin = { x: 0, y: 0 }, parent = null }: FakeBoxInit = {}): RenderBox {
  return {
    constraints: {
      minWidth: 0,
      maxWidth: Infinity,
      minHeight: 0,
      maxHeight: Infinity,
      ...constraints,
    },
    hasSize: size !== undefined,
    size: size ?? { width: 0, height: 0 },
    parent,
    localToGlobal: (point) => ({ x: origin.x + point.x, y: origin.y + point.y }),
  }
}

export interface FakeContextInit {
  media?: MediaQueryData
  box?: RenderBox | null
  overlay?: FakeOverlay | null
  messenger?: FakeMessenger | null
}

export class FakeContext implements UiContext {
  attached = true
  media: MediaQueryData
  box: RenderBox | null
  readonly overlayState: FakeOverlay | null
  readonly messengerState: FakeMessenger | null
  readonly modals: PendingModal[] = []

  constructor({ media, box = null, overlay, messenger }: FakeContextInit = {}) {
    this.media = media ?? { size: { width: 390, height: 844 }, orientation: 'portrait' }
    this.box = box
    this.overlayState = overlay === undefined ? new FakeOverlay() : overlay
    this.messengerState = messenger === undefined ? new FakeMessenger() : messenger
  }

  isAttached(): boolean {
    return this.attached
  }

  mediaQuery(): MediaQueryData {
    return this.media
  }

  findRenderBox(): RenderBox | null {
    return this.box
  }

  overlay(): Overlay | null {
    return this.overlayState
  }

  messenger(): SnackbarMessenger | null {
    return this.messengerState
  }

  showModal<T>(request: ModalRequest<T>): Promise<T | null> {
    return new Promise<T | null>((resolve) => {
      const modal: PendingModal<T> = {
        request,
        element: request.build((value) => resolve(value)),
        resolve: (value) => resolve(value),
        dismiss: () => resolve(null),
      }
      this.modals.push(modal)
    })
  }
}

export class FakePlatformHost implements PlatformHost {
  constructor(
    public familyValue: PlatformFamily = 'android',
    public info: DeviceInfo = { platform: 'Android', brand: 'acme', model: 'A1', device: 'a1', version: '14' },
    public links: ConnectivityKind[] = ['wifi'],
    public failure: Error | null = null,
  ) {}

  family(): PlatformFamily {
    if (this.failure) throw this.failure
    return this.familyValue
  }

  async deviceInfo(): Promise<DeviceInfo> {
    if (this.failure) throw this.failure
    return this.info
  }

  async connectivity(): Promise<ConnectivityKind[]> {
    if (this.failure) throw this.failure
    return this.links
  }
}

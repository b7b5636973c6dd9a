/**
 * Transient feedback on top of the host UI: snackbars, toasts, a global
 * loader, confirm dialogs and bottom sheets.
 *
 * Every entry point checks the context first. A stale context turns the
 * call into a no-op (or a `null` result), never an exception.
 */
import type { ReactElement, ReactNode } from 'react'
import { SheetFrame, MessageSheet } from '../components/BottomSheet'
import { ConfirmDialog } from '../components/ConfirmDialog'
import { Loader } from '../components/Loader'
import { Snackbar, type SnackbarAction, type SnackbarVariant } from '../components/Snackbar'
import { Toast } from '../components/Toast'
import { isLiveContext, type OverlayHandle, type UiContext } from '../host/types'
import { errorMessage } from '../lib/errors'
import { logger as defaultLogger, type Logger } from '../lib/logger'

type Context = UiContext | null | undefined

export const feedbackColors = {
  surface: 'rgba(0, 0, 0, 0.87)',
  onSurface: '#ffffff',
  success: '#43a047',
  error: '#d32f2f',
  info: '#1e88e5',
  sheet: '#ffffff',
} as const

export interface SnackbarOptions {
  message: string
  variant?: SnackbarVariant
  backgroundColor?: string
  textColor?: string
  durationMs?: number
  action?: SnackbarAction
}

export interface ToastOptions {
  message: string
  backgroundColor?: string
  textColor?: string
  durationMs?: number
  /** Distance from the bottom edge, in logical pixels. */
  bottomOffset?: number
}

export interface LoaderOptions {
  message?: string
}

export interface ConfirmDialogOptions {
  title: string
  message: string
  confirmText?: string
  cancelText?: string
}

export interface BottomSheetOptions<T> {
  content: ReactNode | ((close: (value: T) => void) => ReactNode)
  isDismissible?: boolean
  enableDrag?: boolean
  /** Max sheet height as a share of the screen height. */
  maxHeightFraction?: number
  backgroundColor?: string
  borderRadius?: number
}

export interface MessageSheetOptions {
  title: string
  message: string
  buttonText?: string
}

export interface FeedbackOptions {
  logger?: Logger
}

export function createFeedback({ logger = defaultLogger }: FeedbackOptions = {}) {
  // Each visible toast with its pending auto-removal timer.
  const activeToasts = new Map<OverlayHandle, ReturnType<typeof setTimeout>>()
  let loader: OverlayHandle | null = null

  function removeOverlay(handle: OverlayHandle, what: string) {
    try {
      handle.remove()
    } catch (err) {
      logger.warning(`Removing ${what} overlay failed: ${errorMessage(err)}`)
    }
  }

  function clearToasts() {
    for (const [handle, timer] of [...activeToasts]) {
      clearTimeout(timer)
      removeOverlay(handle, 'toast')
    }
    activeToasts.clear()
  }

  function showSnackbar(ctx: Context, options: SnackbarOptions): void {
    if (!isLiveContext(ctx)) return
    const messenger = ctx.messenger()
    if (!messenger) return

    const {
      message,
      variant = 'default',
      backgroundColor = feedbackColors.surface,
      textColor = feedbackColors.onSurface,
      durationMs = 2000,
      action,
    } = options

    messenger.hideCurrent()
    messenger.show(
      <Snackbar
        message={message}
        variant={variant}
        backgroundColor={backgroundColor}
        textColor={textColor}
        action={action}
      />,
      durationMs,
    )
  }

  function showBottomSheet<T>(ctx: Context, options: BottomSheetOptions<T>): Promise<T | null> {
    if (!isLiveContext(ctx)) return Promise.resolve(null)

    const {
      content,
      isDismissible = true,
      enableDrag = true,
      maxHeightFraction = 0.8,
      backgroundColor = feedbackColors.sheet,
      borderRadius = 16,
    } = options
    const maxHeight = ctx.mediaQuery().size.height * maxHeightFraction

    return ctx.showModal<T>({
      kind: 'bottom-sheet',
      dismissible: isDismissible,
      enableDrag,
      build: (close): ReactElement => (
        <SheetFrame maxHeight={maxHeight} backgroundColor={backgroundColor} borderRadius={borderRadius}>
          {typeof content === 'function' ? content(close) : content}
        </SheetFrame>
      ),
    })
  }

  return {
    showSnackbar,

    showSuccessSnackbar(ctx: Context, message: string): void {
      showSnackbar(ctx, { message, variant: 'success', backgroundColor: feedbackColors.success })
    },

    showErrorSnackbar(ctx: Context, message: string): void {
      showSnackbar(ctx, { message, variant: 'error', backgroundColor: feedbackColors.error })
    },

    showInfoSnackbar(ctx: Context, message: string): void {
      showSnackbar(ctx, { message, variant: 'info', backgroundColor: feedbackColors.info })
    },

    /**
     * Replace whatever toast is showing with this one. It removes itself
     * after `durationMs` unless dismissed first.
     */
    showToast(ctx: Context, options: ToastOptions): void {
      if (!isLiveContext(ctx)) return
      const overlay = ctx.overlay()
      if (!overlay) return

      const {
        message,
        backgroundColor = feedbackColors.surface,
        textColor = feedbackColors.onSurface,
        durationMs = 2000,
        bottomOffset = 80,
      } = options

      clearToasts()

      const handle = overlay.insert(
        <Toast
          message={message}
          backgroundColor={backgroundColor}
          textColor={textColor}
          bottomOffset={bottomOffset}
        />,
      )
      const timer = setTimeout(() => {
        if (activeToasts.delete(handle)) removeOverlay(handle, 'toast')
      }, durationMs)
      activeToasts.set(handle, timer)
    },

    dismissAllToasts(ctx: Context): void {
      if (!isLiveContext(ctx)) return
      clearToasts()
    },

    /** At most one loader is shown; repeat calls while it is up do nothing. */
    showLoader(ctx: Context, { message }: LoaderOptions = {}): void {
      if (!isLiveContext(ctx) || loader) return
      const overlay = ctx.overlay()
      if (!overlay) return

      loader = overlay.insert(<Loader message={message} />)
    },

    hideLoader(): void {
      if (!loader) return
      const handle = loader
      loader = null
      removeOverlay(handle, 'loader')
    },

    /** `true` confirmed, `false` cancelled, `null` dismissed. */
    showConfirmDialog(ctx: Context, options: ConfirmDialogOptions): Promise<boolean | null> {
      if (!isLiveContext(ctx)) return Promise.resolve(null)
      const { title, message, confirmText = 'Yes', cancelText = 'Cancel' } = options

      return ctx.showModal<boolean>({
        kind: 'dialog',
        dismissible: true,
        build: (close) => (
          <ConfirmDialog
            title={title}
            message={message}
            confirmText={confirmText}
            cancelText={cancelText}
            onResult={close}
          />
        ),
      })
    },

    showBottomSheet,

    async showMessageSheet(ctx: Context, options: MessageSheetOptions): Promise<void> {
      const { title, message, buttonText = 'Close' } = options
      await showBottomSheet<void>(ctx, {
        content: (close) => (
          <MessageSheet title={title} message={message} buttonText={buttonText} onClose={() => close()} />
        ),
      })
    },

    activeToastCount(): number {
      return activeToasts.size
    },

    hasActiveLoader(): boolean {
      return loader !== null
    },
  }
}

export type Feedback = ReturnType<typeof createFeedback>

export const feedback = createFeedback()

/**
 * Geometry queries against the render box behind a UiContext.
 * All of them return null for a stale context.
 */
import { isLiveContext, type BoxConstraints, type Offset, type Size, type UiContext } from '../host/types'

type Context = UiContext | null | undefined

const ORIGIN: Offset = { x: 0, y: 0 }

/**
 * `fraction` of the parent's max width, or of the screen width when the
 * parent leaves width unbounded.
 */
export function parentWidth(ctx: Context, fraction: number): number | null {
  if (!isLiveContext(ctx)) return null
  const maxWidth = ctx.findRenderBox()?.constraints.maxWidth
  if (maxWidth !== undefined && Number.isFinite(maxWidth)) return maxWidth * fraction
  return ctx.mediaQuery().size.width * fraction
}

export function parentHeight(ctx: Context, fraction: number): number | null {
  if (!isLiveContext(ctx)) return null
  const maxHeight = ctx.findRenderBox()?.constraints.maxHeight
  if (maxHeight !== undefined && Number.isFinite(maxHeight)) return maxHeight * fraction
  return ctx.mediaQuery().size.height * fraction
}

export function remainingParentWidth(ctx: Context, usedWidth: number): number | null {
  if (!isLiveContext(ctx)) return null
  const maxWidth = ctx.findRenderBox()?.constraints.maxWidth ?? ctx.mediaQuery().size.width
  return maxWidth - usedWidth
}

export function remainingParentHeight(ctx: Context, usedHeight: number): number | null {
  if (!isLiveContext(ctx)) return null
  const maxHeight = ctx.findRenderBox()?.constraints.maxHeight ?? ctx.mediaQuery().size.height
  return maxHeight - usedHeight
}

export function getParentConstraints(ctx: Context): BoxConstraints | null {
  if (!isLiveContext(ctx)) return null
  return ctx.findRenderBox()?.constraints ?? null
}

/** Width over height of the parent constraints; null when height is zero. */
export function parentAspectRatio(ctx: Context): number | null {
  const constraints = getParentConstraints(ctx)
  if (!constraints || constraints.maxHeight === 0) return null
  return constraints.maxWidth / constraints.maxHeight
}

export function getGlobalPosition(ctx: Context): Offset | null {
  if (!isLiveContext(ctx)) return null
  const box = ctx.findRenderBox()
  if (!box || !box.hasSize) return null
  return box.localToGlobal(ORIGIN)
}

/** Laid-out size, as opposed to the constraints. */
export function getWidgetSize(ctx: Context): Size | null {
  if (!isLiveContext(ctx)) return null
  const box = ctx.findRenderBox()
  if (!box || !box.hasSize) return null
  return box.size
}

export function getPositionInParent(ctx: Context): Offset | null {
  if (!isLiveContext(ctx)) return null
  const box = ctx.findRenderBox()
  if (!box || !box.parent) return null
  const parentOffset = box.parent.localToGlobal(ORIGIN)
  const childOffset = box.localToGlobal(ORIGIN)
  return { x: childOffset.x - parentOffset.x, y: childOffset.y - parentOffset.y }
}

export { InvalidArgumentError } from './lib/errors'
export { capitalize, slugify, truncate, isEmail, isUrl } from './lib/string'
export {
  formatCurrency,
  formatCompact,
  formatPercentage,
  randomInt,
  randomDouble,
  roundTo,
  floorTo,
  ceilTo,
} from './lib/number'
export type { CurrencyOptions, PercentageOptions } from './lib/number'
export {
  DEFAULT_PATTERN,
  diffSummary,
  format,
  getFormatter,
  isToday,
  isYesterday,
  smartDateTime,
  timeAgo,
} from './lib/date'
export type { DateFormatter } from './lib/date'
export { Logger, consoleSink, logger } from './lib/logger'
export type { LogLevel, LogSink, LoggerConfig } from './lib/logger'
export {
  UNKNOWN_DEVICE,
  createDeviceUtils,
  device,
  isLandscape,
  isPortrait,
  screenHeight,
  screenWidth,
} from './lib/device'
export type { DeviceUtils } from './lib/device'
export {
  getGlobalPosition,
  getParentConstraints,
  getPositionInParent,
  getWidgetSize,
  parentAspectRatio,
  parentHeight,
  parentWidth,
  remainingParentHeight,
  remainingParentWidth,
} from './lib/layout'
export { createFeedback, feedback, feedbackColors } from './widgets/feedback'
export type {
  BottomSheetOptions,
  ConfirmDialogOptions,
  Feedback,
  FeedbackOptions,
  LoaderOptions,
  MessageSheetOptions,
  SnackbarOptions,
  ToastOptions,
} from './widgets/feedback'
export type { SnackbarAction, SnackbarVariant } from './components/Snackbar'
export { isLiveContext } from './host/types'
export type {
  BoxConstraints,
  ConnectivityKind,
  DeviceInfo,
  MediaQueryData,
  ModalKind,
  ModalRequest,
  Offset,
  Orientation,
  Overlay,
  OverlayHandle,
  PlatformFamily,
  PlatformHost,
  RenderBox,
  Size,
  SnackbarMessenger,
  UiContext,
} from './host/types'
export { classifyInterface, connectivityFromInterfaces, nodePlatformHost, platformFamilyFor } from './host/node-platform'

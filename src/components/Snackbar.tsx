import { CheckCircle2, Info, XCircle } from 'lucide-react'

export type SnackbarVariant = 'default' | 'success' | 'error' | 'info'

export interface SnackbarAction {
  label: string
  onPress: () => void
}

interface SnackbarProps {
  message: string
  variant: SnackbarVariant
  backgroundColor: string
  textColor: string
  action?: SnackbarAction
}

const icons = {
  default: null,
  success: CheckCircle2,
  error: XCircle,
  info: Info,
} as const

export function Snackbar({ message, variant, backgroundColor, textColor, action }: SnackbarProps) {
  const Icon = icons[variant]

  return (
    <div
      role={variant === 'error' ? 'alert' : 'status'}
      data-variant={variant}
      style={{
        display: 'flex',
        alignItems: 'center',
        gap: 8,
        padding: '12px 16px',
        backgroundColor,
        color: textColor,
      }}
    >
      {Icon && <Icon size={16} aria-hidden="true" />}
      <span style={{ flex: 1 }}>{message}</span>
      {action && (
        <button type="button" onClick={action.onPress}>
          {action.label}
        </button>
      )}
    </div>
  )
}

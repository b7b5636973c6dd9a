interface ToastProps {
  message: string
  backgroundColor: string
  textColor: string
  bottomOffset: number
}

export function Toast({ message, backgroundColor, textColor, bottomOffset }: ToastProps) {
  return (
    <div
      role="status"
      aria-live="polite"
      style={{ position: 'absolute', left: 20, right: 20, bottom: bottomOffset }}
    >
      <div
        style={{
          padding: '12px 16px',
          borderRadius: 8,
          backgroundColor,
          color: textColor,
          fontSize: 14,
          textAlign: 'center',
        }}
      >
        {message}
      </div>
    </div>
  )
}

import type { ReactNode } from 'react'

interface SheetFrameProps {
  maxHeight: number
  backgroundColor: string
  borderRadius: number
  children: ReactNode
}

/** Rounded-top container every bottom sheet is wrapped in. */
export function SheetFrame({ maxHeight, backgroundColor, borderRadius, children }: SheetFrameProps) {
  return (
    <div
      role="dialog"
      style={{
        maxHeight,
        overflow: 'hidden',
        backgroundColor,
        borderTopLeftRadius: borderRadius,
        borderTopRightRadius: borderRadius,
        boxShadow: '0 -3px 10px rgba(0, 0, 0, 0.26)',
      }}
    >
      {children}
    </div>
  )
}

interface MessageSheetProps {
  title: string
  message: string
  buttonText: string
  onClose: () => void
}

export function MessageSheet({ title, message, buttonText, onClose }: MessageSheetProps) {
  return (
    <div style={{ display: 'flex', flexDirection: 'column', alignItems: 'center', padding: 20 }}>
      <h2 style={{ fontSize: 18, fontWeight: 'bold' }}>{title}</h2>
      <p style={{ marginTop: 10, fontSize: 16, textAlign: 'center' }}>{message}</p>
      <button type="button" style={{ marginTop: 20 }} onClick={onClose}>
        {buttonText}
      </button>
    </div>
  )
}

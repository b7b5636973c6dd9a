import { Loader2 } from 'lucide-react'

interface LoaderProps {
  message?: string
}

/** Full-screen, non-dismissible barrier with a spinner. */
export function Loader({ message }: LoaderProps) {
  return (
    <div
      role="progressbar"
      aria-busy="true"
      style={{
        position: 'fixed',
        inset: 0,
        display: 'flex',
        flexDirection: 'column',
        alignItems: 'center',
        justifyContent: 'center',
        backgroundColor: 'rgba(0, 0, 0, 0.38)',
      }}
    >
      <Loader2 className="animate-spin" size={32} aria-hidden="true" />
      {message && <p style={{ marginTop: 12, color: '#ffffff', fontSize: 16 }}>{message}</p>}
    </div>
  )
}

interface ConfirmDialogProps {
  title: string
  message: string
  confirmText: string
  cancelText: string
  onResult: (confirmed: boolean) => void
}

export function ConfirmDialog({ title, message, confirmText, cancelText, onResult }: ConfirmDialogProps) {
  return (
    <div role="alertdialog" aria-labelledby="confirm-dialog-title">
      <h2 id="confirm-dialog-title">{title}</h2>
      <p>{message}</p>
      <div style={{ display: 'flex', justifyContent: 'flex-end', gap: 8 }}>
        <button type="button" onClick={() => onResult(false)}>
          {cancelText}
        </button>
        <button type="button" data-primary="true" onClick={() => onResult(true)}>
          {confirmText}
        </button>
      </div>
    </div>
  )
}

import { useEffect, useRef, useState } from 'react'
import type { ClipboardEvent, KeyboardEvent } from 'react'
import { applyOtpBackspace, applyOtpInput, applyOtpPaste, emptyOtp, isOtpComplete } from '../../utils/otp.ts'
import type { OtpUpdate } from '../../utils/otp.ts'

type OtpInputProps = {
  length?: number
  onComplete: (code: string) => void
  disabled?: boolean
  autoFocus?: boolean
}

/**
 * One box per digit. Clear it by remounting (change its `key`).
 */
export default function OtpInput({ length = 6, onComplete, disabled = false, autoFocus = false }: OtpInputProps) {
  const [values, setValues] = useState(() => emptyOtp(length))
  const inputs = useRef<(HTMLInputElement | null)[]>([])

  useEffect(() => {
    if (autoFocus) inputs.current[0]?.focus()
  }, [autoFocus])

  const focusBox = (index: number) => {
    const box = inputs.current[index]
    if (!box) return
    box.focus()
    box.select()
  }

  const commit = (update: OtpUpdate) => {
    setValues(update.values)
    focusBox(update.focusIndex)
    // fire on the transition to complete only
    if (isOtpComplete(update.values) && !isOtpComplete(values)) {
      onComplete(update.values.join(''))
    }
  }

  const handleKeyDown = (index: number, e: KeyboardEvent<HTMLInputElement>) => {
    switch (e.key) {
      case 'Backspace':
        e.preventDefault()
        commit(applyOtpBackspace(values, index))
        break
      case 'ArrowLeft':
        e.preventDefault()
        focusBox(Math.max(0, index - 1))
        break
      case 'ArrowRight':
        e.preventDefault()
        focusBox(Math.min(length - 1, index + 1))
        break
    }
  }

  const handlePaste = (index: number, e: ClipboardEvent<HTMLInputElement>) => {
    e.preventDefault()
    commit(applyOtpPaste(values, index, e.clipboardData.getData('text')))
  }

  return (
    <div role="group" aria-label="One-time code" className="flex gap-2">
      {values.map((value, i) => (
        <input
          key={i}
          ref={el => { inputs.current[i] = el }}
          value={value}
          onChange={(e) => commit(applyOtpInput(values, i, e.target.value))}
          onKeyDown={(e) => handleKeyDown(i, e)}
          onPaste={(e) => handlePaste(i, e)}
          onFocus={(e) => e.target.select()}
          disabled={disabled}
          inputMode="numeric"
          autoComplete={i === 0 ? 'one-time-code' : 'off'}
          aria-label={`Digit ${i + 1}`}
          className="w-10 h-12 text-center text-xl font-mono rounded-md bg-slate-950 border border-slate-700 focus:border-indigo-400 text-slate-100 outline-none disabled:opacity-50"
        />
      ))}
    </div>
  )
}

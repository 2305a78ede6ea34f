import { useState } from 'react'
import OtpInput from './OtpInput.tsx'

export const DEMO_CODE = '123456'

type Verification = 'pending' | 'success' | 'failure'

export default function OtpInputDemo() {
  const [verification, setVerification] = useState<Verification>('pending')
  const [attempt, setAttempt] = useState(0)

  const retry = () => {
    setVerification('pending')
    setAttempt(a => a + 1)
  }

  return (
    <div className="flex flex-col items-center gap-5">
      <p className="text-xs text-slate-500">
        Enter the code sent to your phone. (It is <code className="text-slate-300">{DEMO_CODE}</code>.)
      </p>

      <OtpInput
        key={attempt}
        autoFocus
        disabled={verification === 'success'}
        onComplete={(code) => setVerification(code === DEMO_CODE ? 'success' : 'failure')}
      />

      {verification === 'success' && (
        <p role="status" className="text-sm text-emerald-400">Code verified</p>
      )}
      {verification === 'failure' && (
        <p role="alert" className="text-sm text-red-400">That code is not right.</p>
      )}
      {verification !== 'pending' && (
        <button onClick={retry} className="px-3 py-1 rounded bg-slate-800 hover:bg-slate-700 text-xs text-slate-200">
          Start over
        </button>
      )}
    </div>
  )
}

import { useEffect, useRef, useState } from 'react'

type CodeSnippetProps = {
  code: string
  language?: string
  caption?: string
}

export default function CodeSnippet({ code, language, caption }: CodeSnippetProps) {
  const [copied, setCopied] = useState(false)
  const resetTimer = useRef<ReturnType<typeof setTimeout> | undefined>(undefined)

  useEffect(() => () => clearTimeout(resetTimer.current), [])

  function handleCopy() {
    // navigator.clipboard is missing on insecure origins
    const clipboard: Clipboard | undefined = navigator.clipboard
    if (!clipboard) {
      console.error('Failed to copy snippet: clipboard unavailable')
      return
    }
    clipboard.writeText(code).then(
      () => {
        setCopied(true)
        clearTimeout(resetTimer.current)
        resetTimer.current = setTimeout(() => setCopied(false), 1500)
      },
      (err: unknown) => {
        console.error('Failed to copy snippet:', err)
      },
    )
  }

  return (
    <div className="rounded-lg bg-slate-950 border border-slate-800 overflow-hidden">
      {/* Header bar */}
      <div className="flex items-center justify-between px-3 py-1.5 bg-slate-900/60 border-b border-slate-800/50">
        <span className="text-[10px] text-slate-500 uppercase tracking-wider font-medium">
          {language ?? 'code'}
        </span>
        <button
          onClick={handleCopy}
          className="text-[10px] text-slate-500 hover:text-slate-300 transition-colors px-1.5 py-0.5 rounded hover:bg-slate-800"
        >
          {copied ? '✓ Copied' : 'Copy'}
        </button>
      </div>
      {/* Code body */}
      <pre className="p-3 font-mono text-xs text-slate-300 overflow-x-auto whitespace-pre-wrap leading-relaxed">
        <code>{code}</code>
      </pre>
      {caption && (
        <div className="px-3 pb-2">
          <p className="text-[11px] text-slate-500 italic">{caption}</p>
        </div>
      )}
    </div>
  )
}

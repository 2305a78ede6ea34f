export type OtpUpdate = {
  values: string[]
  focusIndex: number
}

const NON_DIGITS = /\D/g

export function emptyOtp(length: number): string[] {
  return Array.from({ length }, () => '')
}

export function isOtpComplete(values: readonly string[]): boolean {
  return values.length > 0 && values.every(v => v.length === 1)
}

/**
 * Spread the digits of `text` into the boxes starting at `index`.
 * Non-digits are dropped; digits past the last box are ignored.
 */
export function applyOtpPaste(values: readonly string[], index: number, text: string): OtpUpdate {
  const digits = text.replace(NON_DIGITS, '').slice(0, values.length - index)
  if (!digits) return { values: [...values], focusIndex: index }

  const next = [...values]
  for (let i = 0; i < digits.length; i++) {
    next[index + i] = digits[i]
  }
  return { values: next, focusIndex: Math.min(index + digits.length, values.length - 1) }
}

/**
 * Apply the raw value of box `index` after an input event.
 */
export function applyOtpInput(values: readonly string[], index: number, input: string): OtpUpdate {
  if (input === '') {
    const next = [...values]
    next[index] = ''
    return { values: next, focusIndex: index }
  }

  let digits = input.replace(NON_DIGITS, '')
  if (!digits) return { values: [...values], focusIndex: index }

  // Typing into a filled box leaves old + new digit in the field; keep the new one
  const current = values[index]
  if (current && digits.length === 2 && digits.includes(current)) {
    digits = digits.replace(current, '')
  }

  if (digits.length > 1) return applyOtpPaste(values, index, digits)

  const next = [...values]
  next[index] = digits
  return { values: next, focusIndex: Math.min(index + 1, values.length - 1) }
}

/**
 * Backspace clears the box, or when it is already empty, the one before it.
 */
export function applyOtpBackspace(values: readonly string[], index: number): OtpUpdate {
  const next = [...values]
  if (next[index]) {
    next[index] = ''
    return { values: next, focusIndex: index }
  }
  if (index === 0) return { values: next, focusIndex: 0 }
  next[index - 1] = ''
  return { values: next, focusIndex: index - 1 }
}

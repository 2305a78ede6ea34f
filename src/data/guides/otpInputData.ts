import type { Guide } from './types'

export const otpInputGuide: Guide = {
  id: 'guide-otp-input',
  title: 'OTP Input',
  subtitle: 'Several boxes that behave like one field',
  color: 'slate',
  icon: '🔢',
  sections: [
    {
      id: 'behaviour',
      title: 'Expected Behaviour',
      content: [
        {
          type: 'text',
          body: 'Users expect a code field to move on after each digit, step back on Backspace, and accept a pasted code in one go. Each rule is a pure function from the current digits and the box index to new digits and the box to focus, so the component only wires events to those functions.',
        },
        {
          type: 'comparison',
          leftLabel: 'Event',
          rightLabel: 'Result',
          rows: [
            { label: 'Digit typed', left: 'Fill the box', right: 'Focus the next box' },
            { label: 'Letter typed', left: 'Ignored', right: 'Focus stays' },
            { label: 'Backspace on filled box', left: 'Clear it', right: 'Focus stays' },
            { label: 'Backspace on empty box', left: 'Clear the previous box', right: 'Focus moves back' },
            { label: 'Paste "12-34"', left: 'Fill 1, 2, 3, 4 from here', right: 'Focus after the last digit' },
          ],
        },
        {
          type: 'code',
          language: 'typescript',
          code: `applyOtpPaste(['', '', '', '', '', ''], 0, '12-34')
// { values: ['1', '2', '3', '4', '', ''], focusIndex: 4 }`,
        },
      ],
    },
    {
      id: 'complete',
      title: 'Completion',
      content: [
        {
          type: 'text',
          body: 'onComplete fires when the digits go from incomplete to complete. Overwriting a digit in a full code does not fire it again; clearing a box and typing a new digit does.',
        },
        {
          type: 'callout',
          tone: 'tip',
          body: 'autocomplete="one-time-code" on the first box lets mobile keyboards offer the code from an SMS.',
        },
        {
          type: 'quiz',
          question: 'The focus is on box 4 of 6 and the user pastes "987654". What ends up in the boxes?',
          options: ['987654 from box 1', '98 in boxes 5 and 6', '987 in boxes 4 to 6'],
          correctIndex: 2,
          explanation: 'Pasting fills from the focused box onward and drops what does not fit: boxes 4, 5 and 6 receive 9, 8 and 7.',
        },
      ],
    },
  ],
  connections: [
    { concept: 'Pure rules', file: 'src/utils/otp.ts', description: 'Input, paste and backspace as functions' },
    { concept: 'Component', file: 'src/components/demos/OtpInput.tsx', description: 'Refs per box and focus management' },
  ],
}

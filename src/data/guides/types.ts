// ── Guide content model ──
//
// A guide is a list of sections; a section is a list of blocks. Blocks are a
// discriminated union so the renderer can switch on `type`.

import type { CalloutTone } from '../../components/shared/Callout.tsx'
import type { ComparisonRow } from '../../components/shared/ComparisonTable.tsx'

export type GuideColor = 'orange' | 'teal' | 'blue' | 'yellow' | 'slate' | 'indigo' | 'cyan' | 'emerald' | 'rose' | 'violet'

export type DiagramNode = {
  id: string
  label: string
  icon?: string
}

export type DiagramConnection = {
  from: string
  to: string
  label?: string
}

export type GuideSectionContent =
  | { type: 'text'; body: string }
  | { type: 'code'; code: string; language?: string; caption?: string }
  | { type: 'concept-card'; term: string; explanation: string; example?: string }
  | { type: 'comparison'; leftLabel: string; rightLabel: string; rows: ComparisonRow[] }
  | { type: 'quiz'; question: string; options: string[]; correctIndex: number; explanation: string }
  | { type: 'diagram'; nodes: DiagramNode[]; connections: DiagramConnection[] }
  | { type: 'callout'; tone: CalloutTone; body: string }

export type GuideSection = {
  id: string
  title: string
  content: GuideSectionContent[]
}

export type GuideConnection = {
  concept: string
  file: string                  // path in this repo
  description: string
}

export type Guide = {
  id: string
  title: string
  subtitle: string
  color: GuideColor
  icon: string
  sections: GuideSection[]
  connections: GuideConnection[]
}

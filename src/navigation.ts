// ── Navigation types & data ──

export type NavSection = {
  part: number
  label: string
  icon: string
  items: NavItem[]
}

export type NavItem = {
  id: string
  label: string
  icon: string
  color: string          // Tailwind color class for active state
}

export type ActiveView = {
  part: number
  section: string        // item id within the part
}

export const NAV_SECTIONS: NavSection[] = [
  {
    part: 1,
    label: 'UI Patterns',
    icon: '🧱',
    items: [
      { id: 'infinite-scroll', label: 'Infinite Scroll',    icon: '♾️', color: 'text-cyan-400' },
      { id: 'search-bar',      label: 'Search Bar',         icon: '🔍', color: 'text-blue-400' },
      { id: 'todo-list',       label: 'Todo List',          icon: '✅', color: 'text-emerald-400' },
      { id: 'autocomplete',    label: 'Autocomplete',       icon: '💡', color: 'text-violet-400' },
      { id: 'otp-input',       label: 'OTP Input',          icon: '🔢', color: 'text-slate-400' },
      { id: 'stopwatch',       label: 'Stopwatch',          icon: '⏱️', color: 'text-yellow-400' },
      { id: 'realtime',        label: 'Real-Time Data',     icon: '📈', color: 'text-emerald-400' },
    ],
  },
  {
    part: 2,
    label: 'State & Composition',
    icon: '🔀',
    items: [
      { id: 'routing',  label: 'Routing',                 icon: '🧭', color: 'text-indigo-400' },
      { id: 'context',  label: 'Context',                 icon: '🧩', color: 'text-teal-400' },
      { id: 'hooks',    label: 'Custom Hooks',            icon: '🪝', color: 'text-orange-400' },
      { id: 'saga',     label: 'Sagas',                   icon: '🌀', color: 'text-rose-400' },
      { id: 'hoc',      label: 'Higher-Order Components', icon: '🎁', color: 'text-indigo-400' },
    ],
  },
  {
    part: 3,
    label: 'Concepts',
    icon: '📚',
    items: [
      { id: 'guide-solid',      label: 'SOLID',      icon: '🏛️', color: 'text-blue-400' },
      { id: 'guide-acid',       label: 'ACID',       icon: '🧪', color: 'text-yellow-400' },
      { id: 'guide-networking', label: 'Networking', icon: '🌐', color: 'text-cyan-400' },
    ],
  },
  {
    part: 4,
    label: 'Interview Prep',
    icon: '🎤',
    items: [
      { id: 'interview', label: 'Questions & Glossary', icon: '🃏', color: 'text-rose-400' },
    ],
  },
]

export const DEFAULT_VIEW: ActiveView = { part: 0, section: 'home' }

export function findNavItem(view: ActiveView): NavItem | undefined {
  return NAV_SECTIONS.find(s => s.part === view.part)?.items.find(i => i.id === view.section)
}

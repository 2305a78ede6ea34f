import { afterEach, describe, it, expect, vi } from 'vitest'
import { act, fireEvent, render, screen, within } from '@testing-library/react'
import userEvent from '@testing-library/user-event'
import TodoListDemo from '../components/demos/TodoListDemo.tsx'
import SearchBarDemo from '../components/demos/SearchBarDemo.tsx'
import type { SearchItem } from '../components/demos/SearchBarDemo.tsx'
import { FeedList } from '../components/demos/InfiniteScrollDemo.tsx'
import AutocompleteDemo from '../components/demos/AutocompleteDemo.tsx'
import OtpInputDemo from '../components/demos/OtpInputDemo.tsx'
import StopwatchDemo from '../components/demos/StopwatchDemo.tsx'
import RealtimeDemo from '../components/demos/RealtimeDemo.tsx'
import { createFeedSource } from '../services/feed.ts'
import type { SearchFn } from '../services/suggestions.ts'
import { formatClock } from '../utils/formatters.ts'
import { MockIntersectionObserver } from './helpers/intersectionObserver.ts'
import { FakeWebSocket } from './helpers/webSocket.ts'

afterEach(() => {
  vi.useRealTimers()
})

describe('TodoListDemo', () => {
  function setup() {
    let n = 0
    const user = userEvent.setup()
    render(<TodoListDemo createId={() => `t${++n}`} now={() => 0} />)
    return { user, input: screen.getByRole('textbox', { name: 'New todo' }) }
  }

  const rows = () => within(screen.getByRole('list', { name: 'Todos' })).queryAllByRole('listitem')

  it('adds trimmed todos and ignores blank ones', async () => {
    const { user, input } = setup()

    await user.type(input, '  Buy milk {Enter}')
    await user.type(input, '   {Enter}')
    await user.type(input, 'Walk dog{Enter}')

    expect(rows().map(r => r.textContent)).toEqual(['Buy milk✕', 'Walk dog✕'])
    expect(screen.getByText('2 items left')).toBeInTheDocument()
    expect(input).toHaveValue('')
  })

  it('completes, filters and clears', async () => {
    const { user, input } = setup()
    await user.type(input, 'Buy milk{Enter}')
    await user.type(input, 'Walk dog{Enter}')

    await user.click(screen.getByRole('checkbox', { name: 'Mark "Buy milk" complete' }))
    expect(screen.getByText('1 item left')).toBeInTheDocument()

    await user.click(screen.getByRole('button', { name: 'Active' }))
    expect(rows()).toHaveLength(1)
    expect(rows()[0]).toHaveTextContent('Walk dog')

    await user.click(screen.getByRole('button', { name: 'Completed' }))
    expect(rows()[0]).toHaveTextContent('Buy milk')

    await user.click(screen.getByRole('button', { name: 'Clear completed' }))
    expect(rows()).toHaveLength(0)

    await user.click(screen.getByRole('button', { name: 'All' }))
    expect(rows()).toHaveLength(1)
  })

  it('edits in place on double click', async () => {
    const { user, input } = setup()
    await user.type(input, 'Walk dog{Enter}')

    await user.dblClick(screen.getByText('Walk dog'))
    const editor = screen.getByRole('textbox', { name: 'Edit "Walk dog"' })
    await user.clear(editor)
    await user.type(editor, 'Walk the dog{Enter}')

    expect(screen.getByText('Walk the dog')).toBeInTheDocument()
    expect(screen.queryByRole('textbox', { name: /^Edit/ })).not.toBeInTheDocument()
  })

  it('starts empty when the saved list is malformed', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    localStorage.setItem('study-guide-todos', '{"todos":null,"filter":"all"}')
    const { user, input } = setup()
    expect(rows()).toEqual([])

    await user.type(input, 'Fresh start{Enter}')
    expect(rows().map(r => r.textContent)).toEqual(['Fresh start✕'])
  })

  it('persists the list to localStorage', async () => {
    const { user, input } = setup()
    await user.type(input, 'Buy milk{Enter}')

    const saved: { todos: { id: string; text: string }[] } = JSON.parse(localStorage.getItem('study-guide-todos') ?? '{}')
    expect(saved.todos.map(t => [t.id, t.text])).toEqual([['t1', 'Buy milk']])
  })
})

describe('SearchBarDemo', () => {
  const items: SearchItem[] = [
    { id: 'react', name: 'React', category: 'UI' },
    { id: 'redux', name: 'Redux', category: 'State' },
    { id: 'vue', name: 'Vue', category: 'UI' },
  ]

  it('filters after the debounce and highlights the match', async () => {
    const user = userEvent.setup()
    const { container } = render(<SearchBarDemo items={items} debounceMs={50} />)
    expect(screen.getByText('3 results')).toBeInTheDocument()

    await user.type(screen.getByRole('searchbox', { name: 'Search frameworks' }), 'RE')
    expect(await screen.findByText('2 results')).toBeInTheDocument()
    expect([...container.querySelectorAll('mark')].map(m => m.textContent)).toEqual(['Re', 'Re'])

    await user.click(screen.getByRole('button', { name: 'Clear search' }))
    expect(await screen.findByText('3 results')).toBeInTheDocument()
  })

  it('says when nothing matches', async () => {
    const user = userEvent.setup()
    render(<SearchBarDemo items={items} debounceMs={0} />)

    await user.type(screen.getByRole('searchbox'), 'zzz')
    expect(await screen.findByText('No results')).toBeInTheDocument()
    expect(within(screen.getByRole('list', { name: 'Results' })).queryAllByRole('listitem')).toHaveLength(0)
  })
})

describe('FeedList', () => {
  function reachBottom() {
    const [observer] = MockIntersectionObserver.observing(screen.getByTestId('feed-sentinel'))
    act(() => { observer.trigger(true) })
  }

  const titles = () =>
    within(screen.getByRole('list', { name: 'Feed' })).queryAllByRole('listitem').map(li => li.firstChild?.textContent)

  it('loads a page each time the sentinel comes into view', async () => {
    render(<FeedList fetchPage={createFeedSource({ total: 5, latencyMs: 0 })} pageSize={2} />)
    expect(titles()).toEqual([])

    reachBottom()
    expect(screen.getByRole('status')).toHaveTextContent('Loading…')
    expect(await screen.findByText('Post #2')).toBeInTheDocument()

    reachBottom()
    expect(await screen.findByText('Post #4')).toBeInTheDocument()

    reachBottom()
    expect(await screen.findByText("You've reached the end")).toBeInTheDocument()
    expect(titles()).toEqual(['Post #1', 'Post #2', 'Post #3', 'Post #4', 'Post #5'])
    expect(screen.queryByTestId('feed-sentinel')).not.toBeInTheDocument()
  })

  it('stops on a failed page until retried', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const user = userEvent.setup()
    render(<FeedList fetchPage={createFeedSource({ total: 10, latencyMs: 0, failEvery: 2 })} pageSize={2} />)

    reachBottom()
    await screen.findByText('Post #2')
    reachBottom()

    expect(await screen.findByRole('alert')).toHaveTextContent('Failed to load page 2')
    expect(MockIntersectionObserver.observing(screen.getByTestId('feed-sentinel'))).toHaveLength(0)

    await user.click(screen.getByRole('button', { name: 'Retry' }))
    expect(await screen.findByText('Post #4')).toBeInTheDocument()
    expect(screen.queryByRole('alert')).not.toBeInTheDocument()
  })
})

describe('AutocompleteDemo', () => {
  const countries = ['Cameroon', 'Canada', 'Chile']
  const search: SearchFn = async (query) => countries.filter(c => c.toLowerCase().startsWith(query))

  it('navigates suggestions with the keyboard and selects with Enter', async () => {
    const user = userEvent.setup()
    render(<AutocompleteDemo search={search} />)
    const input = screen.getByRole('combobox', { name: 'Country' })

    await user.type(input, 'ca')
    const listbox = await screen.findByRole('listbox', { name: 'Country suggestions' })
    const options = within(listbox).getAllByRole('option')
    expect(options.map(o => o.textContent)).toEqual(['Cameroon', 'Canada'])
    expect(input).toHaveAttribute('aria-expanded', 'true')

    await user.keyboard('{ArrowDown}{ArrowDown}{ArrowDown}')
    expect(options[0]).toHaveAttribute('aria-selected', 'true')
    expect(input).toHaveAttribute('aria-activedescendant', options[0].id)

    await user.keyboard('{ArrowUp}{Enter}')
    expect(input).toHaveValue('Canada')
    expect(screen.queryByRole('listbox')).not.toBeInTheDocument()
    expect(screen.getByText(/Selected:/)).toHaveTextContent('Selected: Canada')
  })

  it('closes on Escape', async () => {
    const user = userEvent.setup()
    render(<AutocompleteDemo search={search} />)

    await user.type(screen.getByRole('combobox'), 'ch')
    await screen.findByRole('listbox')
    await user.keyboard('{Escape}')
    expect(screen.queryByRole('listbox')).not.toBeInTheDocument()
  })
})

describe('OtpInputDemo', () => {
  const box = (n: number) => screen.getByRole('textbox', { name: `Digit ${n}` })

  it('verifies the right code typed box by box', async () => {
    const user = userEvent.setup()
    render(<OtpInputDemo />)

    await user.click(box(1))
    await user.keyboard('123456')

    expect(screen.getByRole('status')).toHaveTextContent('Code verified')
    expect(box(6)).toHaveValue('6')
    expect(box(1)).toBeDisabled()
  })

  it('rejects a wrong code and starts over', async () => {
    const user = userEvent.setup()
    render(<OtpInputDemo />)

    await user.click(box(1))
    await user.keyboard('123450')
    expect(screen.getByRole('alert')).toHaveTextContent('That code is not right.')

    await user.click(screen.getByRole('button', { name: 'Start over' }))
    expect(screen.queryByRole('alert')).not.toBeInTheDocument()
    expect(box(1)).toHaveValue('')
  })

  it('steps back with Backspace', async () => {
    const user = userEvent.setup()
    render(<OtpInputDemo />)

    await user.click(box(1))
    await user.keyboard('12{Backspace}')

    expect(box(1)).toHaveValue('1')
    expect(box(2)).toHaveValue('')
    expect(box(2)).toHaveFocus()
  })

  it('spreads a pasted code across the boxes', async () => {
    const user = userEvent.setup()
    render(<OtpInputDemo />)

    await user.click(box(1))
    await user.paste('12-34 56')

    expect(screen.getByRole('status')).toHaveTextContent('Code verified')
  })
})

describe('StopwatchDemo', () => {
  it('records laps and pauses against the injected clock', () => {
    vi.useFakeTimers()
    let clock = 1000
    render(<StopwatchDemo now={() => clock} />)
    const click = (name: string) => fireEvent.click(screen.getByRole('button', { name }))

    expect(screen.getByRole('timer')).toHaveTextContent('00:00.00')
    click('Start')
    clock = 2500
    click('Lap')
    clock = 3300
    click('Pause')
    expect(screen.getByRole('timer')).toHaveTextContent('00:02.30')

    clock = 10_000
    click('Resume')
    clock = 10_700
    click('Lap')

    const laps = within(screen.getByRole('list', { name: 'Laps' })).getAllByRole('listitem')
    expect(laps).toHaveLength(2)
    expect(within(laps[0]).getAllByText('00:01.50')).toHaveLength(2)
    expect(within(laps[1]).getByText('Lap 2')).toBeInTheDocument()
    expect(within(laps[1]).getByText('00:03.00')).toBeInTheDocument()

    click('Pause')
    click('Reset')
    expect(screen.getByRole('timer')).toHaveTextContent('00:00.00')
    expect(screen.queryByRole('list', { name: 'Laps' })).not.toBeInTheDocument()
    expect(screen.getByRole('button', { name: 'Start' })).toBeInTheDocument()
  })
})

describe('RealtimeDemo', () => {
  it('shows quotes, trends and the message log from the socket', async () => {
    FakeWebSocket.reset()
    vi.stubGlobal('WebSocket', FakeWebSocket)
    const user = userEvent.setup()
    render(<RealtimeDemo url="ws://quotes" />)

    expect(screen.getByText('Waiting for the first quote…')).toBeInTheDocument()
    expect(screen.getByText('connecting')).toBeInTheDocument()

    const socket = FakeWebSocket.latest()
    act(() => {
      socket.open()
      socket.receive('{"symbol":"ACME","price":100,"timestamp":1000}')
      socket.receive('{"symbol":"ACME","price":101.5,"timestamp":2000}')
    })

    expect(screen.getByText('open')).toBeInTheDocument()
    expect(screen.getByText('2 updates')).toBeInTheDocument()
    const table = screen.getByRole('table', { name: 'Quotes' })
    expect(within(table).getByText('101.50')).toHaveTextContent('▲ 101.50')

    const log = within(screen.getByRole('list', { name: 'Message log' })).getAllByRole('listitem')
    expect(log.map(li => li.textContent)).toEqual([
      `#2 ${formatClock(2000)} ACME 101.50`,
      `#1 ${formatClock(1000)} ACME 100.00`,
    ])

    act(() => { socket.drop() })
    expect(screen.getByText('reconnecting')).toBeInTheDocument()
    expect(screen.getByText('attempt 1')).toBeInTheDocument()

    await user.click(screen.getByRole('button', { name: 'Clear' }))
    expect(screen.getByText('0 updates')).toBeInTheDocument()
    expect(screen.getByText('Waiting for the first quote…')).toBeInTheDocument()
  })
})

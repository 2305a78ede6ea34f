import type { Guide } from './types'
import { infiniteScrollGuide } from './infiniteScrollData'
import { searchBarGuide } from './searchBarData'
import { todoListGuide } from './todoListData'
import { autocompleteGuide } from './autocompleteData'
import { routingGuide } from './routingData'
import { contextGuide } from './contextData'
import { hooksGuide } from './hooksData'
import { sagaGuide } from './sagaData'
import { stopwatchGuide } from './stopwatchData'
import { realtimeGuide } from './realtimeData'
import { otpInputGuide } from './otpInputData'
import { hocGuide } from './hocData'
import { solidGuide } from './solidData'
import { acidGuide } from './acidData'
import { networkingGuide } from './networkingData'

export {
  infiniteScrollGuide,
  searchBarGuide,
  todoListGuide,
  autocompleteGuide,
  routingGuide,
  contextGuide,
  hooksGuide,
  sagaGuide,
  stopwatchGuide,
  realtimeGuide,
  otpInputGuide,
  hocGuide,
  solidGuide,
  acidGuide,
  networkingGuide,
}

export const ALL_GUIDES: Guide[] = [
  infiniteScrollGuide,
  searchBarGuide,
  todoListGuide,
  autocompleteGuide,
  routingGuide,
  contextGuide,
  hooksGuide,
  sagaGuide,
  stopwatchGuide,
  realtimeGuide,
  otpInputGuide,
  hocGuide,
  solidGuide,
  acidGuide,
  networkingGuide,
]

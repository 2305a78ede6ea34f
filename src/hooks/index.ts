/**
 * Custom hooks
 *
 * Re-exported here so demos and guides can import from one place.
 */

export { useDebounce } from './useDebounce';
export { useThrottle } from './useThrottle';
export { useLocalStorage } from './useLocalStorage';
export { useFetch } from './useFetch';
export { useInterval } from './useInterval';
export { usePrevious } from './usePrevious';
export { useIntersectionObserver } from './useIntersectionObserver';
export { useOnClickOutside } from './useOnClickOutside';
export { useInfiniteScroll } from './useInfiniteScroll';
export { useAutocomplete } from './useAutocomplete';
export { useStopwatch } from './useStopwatch';
export { useWebSocket } from './useWebSocket';
export { useTickerFeed } from './useTickerFeed';

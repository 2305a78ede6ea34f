/**
 * In-process IntersectionObserver. Tests flip visibility with `trigger`.
 */
export class MockIntersectionObserver implements IntersectionObserver {
  static instances: MockIntersectionObserver[] = []

  readonly root = null
  readonly rootMargin: string
  readonly scrollMargin = '0px'
  readonly thresholds: readonly number[]
  readonly targets = new Set<Element>()
  disconnected = false

  private readonly callback: IntersectionObserverCallback

  constructor(callback: IntersectionObserverCallback, options: IntersectionObserverInit = {}) {
    this.callback = callback
    this.rootMargin = options.rootMargin ?? '0px'
    const threshold = options.threshold ?? 0
    this.thresholds = Array.isArray(threshold) ? threshold : [threshold]
    MockIntersectionObserver.instances.push(this)
  }

  observe(target: Element): void {
    this.targets.add(target)
  }

  unobserve(target: Element): void {
    this.targets.delete(target)
  }

  disconnect(): void {
    this.disconnected = true
    this.targets.clear()
  }

  takeRecords(): IntersectionObserverEntry[] {
    return []
  }

  trigger(isIntersecting: boolean): void {
    const entries = [...this.targets].map((target): IntersectionObserverEntry => {
      const rect = target.getBoundingClientRect()
      return {
        boundingClientRect: rect,
        intersectionRatio: isIntersecting ? 1 : 0,
        intersectionRect: rect,
        isIntersecting,
        rootBounds: null,
        target,
        time: Date.now(),
      }
    })
    this.callback(entries, this)
  }

  static reset(): void {
    MockIntersectionObserver.instances = []
  }

  /** Observers that are still watching `target` */
  static observing(target: Element): MockIntersectionObserver[] {
    return MockIntersectionObserver.instances.filter(o => !o.disconnected && o.targets.has(target))
  }
}

export {
  BrowserSession,
  createBrowserSession,
  type BrowserSessionOptions,
  type BrowserTab,
  type NavigationResponse,
  type TabProvider,
} from './browser-session'
export { BrowserProbe, createBrowserProbe, toProbeError, type BrowserProbeOptions } from './probe'
export { extractSignal, collapseWhitespace, type PageSnapshot } from './signal-extractor'

export * from './text-normalization'
export * from './fragment-extraction'
export * from './span-locator'
export * from './overlap-merger'
export * from './highlight-renderer'
export * from './narrative-highlighter'
export * from './document-filters'
export * from './document-store'
export * from './document-page'
export * from './highlight-cache'
export * from './config'
export * from './errors'
export type * from '../../types/narratives'

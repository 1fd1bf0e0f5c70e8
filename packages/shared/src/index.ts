export * from './constants'
export type * from './types/agent'
export type * from './types/approval'
export type * from './types/chat'
export type * from './types/conversation'
export type * from './types/errors'
export type * from './types/tool'

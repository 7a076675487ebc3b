import { type Reply, type Session } from './session.js'

export type Command = (session: Session) => Reply

export const COMMAND_MAP = new Map<string, Command>()

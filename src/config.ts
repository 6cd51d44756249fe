import { z } from 'zod'
import { CASEMAPPINGS } from './isupport'
import { LOG_LEVELS } from './log'

/**
 * Options for a Session. Everything but the name can also arrive later
 * through RPL_WELCOME and RPL_ISUPPORT; values given here are the starting
 * point before the server has said anything.
 */
export const sessionOptionsSchema = z.object({
  name: z.string().min(1),
  nickname: z.string().min(1).optional(),
  casemapping: z.enum(CASEMAPPINGS).optional(),
  // ISUPPORT PREFIX value, e.g. "(qaohv)~&@%+"
  prefix: z.string().optional(),
  // ISUPPORT CHANTYPES value, e.g. "#&"
  chantypes: z.string().min(1).optional(),
  // ISUPPORT CHANMODES value, e.g. "beI,k,l,imnpst"
  chanmodes: z.string().regex(/^[^,]*(,[^,]*){3,}$/, 'CHANMODES needs four comma separated groups').optional(),
  logLevel: z.enum(LOG_LEVELS).optional()
})

export type SessionOptions = z.infer<typeof sessionOptionsSchema>

export function parseSessionOptions (input: unknown): SessionOptions {
  return sessionOptionsSchema.parse(input)
}

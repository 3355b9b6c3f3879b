import { z } from 'zod'
import { LevelSchema } from './level'

const IdentifierListSchema = z.array(z.string().regex(/^[A-Za-z_$][\w$]*$/, 'must be a valid identifier')).min(1)

export const TripwireConfigSchema = z.object({
  level: LevelSchema.default('NoAssertions'),
  quitOnAssert: z.boolean().default(false),
  calleeNames: IdentifierListSchema.default(['assert']),
  levelNames: IdentifierListSchema.default(['Level']),
  outDir: z.string().min(1).default('stripped'),
})

export type TripwireConfig = z.infer<typeof TripwireConfigSchema>
export type TripwireConfigInput = z.input<typeof TripwireConfigSchema>

import { UnprocessableEntityException } from '@nestjs/common'
import { createZodValidationPipe } from 'nestjs-zod'
import type { ZodError } from 'zod'

const CustomZodValidationPipe = createZodValidationPipe({
  // Same body shape as the domain errors: [{ message, path }]
  createValidationException: (error: ZodError) =>
    new UnprocessableEntityException(
      error.issues.map((issue) => ({
        message: issue.message,
        path: issue.path.join('.'),
      })),
    ),
})

export default CustomZodValidationPipe

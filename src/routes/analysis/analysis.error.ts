import {
  BadGatewayException,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common'

export interface ErrorIssue {
  message: string
  path: string
}

// Check result errors
export const MalformedCheckResultException = (paths: string[]) =>
  new UnprocessableEntityException(
    paths.map((path): ErrorIssue => ({
      message: 'Error.MalformedCheckResult',
      path,
    })),
  )

export const MalformedStrengthsException = (paths: string[]) =>
  new UnprocessableEntityException(
    paths.map((path): ErrorIssue => ({
      message: 'Error.MalformedStrengths',
      path,
    })),
  )

// Judge (LLM) errors
export const JudgeUnavailableException = new ServiceUnavailableException([
  {
    message: 'Error.JudgeUnavailable',
    path: 'judge',
  },
])

export const JudgeRequestFailedException = new BadGatewayException([
  {
    message: 'Error.JudgeRequestFailed',
    path: 'judge',
  },
])

// The raw text travels with the error so a caller can show the unparsed verdict instead
export const JudgeOutputUnparseableException = (rawText: string, reason: string) =>
  new BadGatewayException({
    message: [
      {
        message: 'Error.JudgeOutputUnparseable',
        path: 'judge',
      },
    ],
    reason,
    rawText,
  })

// Document errors
export const DocumentMissingException = new UnprocessableEntityException([
  {
    message: 'Error.DocumentMissing',
    path: 'file',
  },
])

export const DocumentUnsupportedTypeException = new UnprocessableEntityException([
  {
    message: 'Error.DocumentUnsupportedType',
    path: 'file',
  },
])

export const DocumentUnreadableException = new UnprocessableEntityException([
  {
    message: 'Error.DocumentUnreadable',
    path: 'file',
  },
])

export const DocumentEmptyTextException = new UnprocessableEntityException([
  {
    message: 'Error.DocumentEmptyText',
    path: 'file',
  },
])

export const ResumeTextTooShortException = new UnprocessableEntityException([
  {
    message: 'Error.ResumeTextTooShort',
    path: 'resumeText',
  },
])

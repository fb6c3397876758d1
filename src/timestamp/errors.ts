import { INVALID_DATE_MESSAGE, type InvalidDateBody } from './models.js'

export class InvalidDateError extends Error {
  readonly input: string

  constructor(input: string) {
    super(INVALID_DATE_MESSAGE)
    this.name = 'InvalidDateError'
    this.input = input
  }
}

export function toErrorBody(): InvalidDateBody {
  return { error: INVALID_DATE_MESSAGE }
}

import { describe, it, expect } from 'vitest'
import { AppError, ErrorType, toError } from '../../../src/models/error.js'

/**
 * AppError 單元測試
 */
describe('AppError', () => {
  it('保留錯誤類型、訊息與名稱', () => {
    const error = new AppError(ErrorType.ACCESS_ERROR, 'Repository access verification failed')

    expect(error).toBeInstanceOf(Error)
    expect(error.type).toBe(ErrorType.ACCESS_ERROR)
    expect(error.message).toBe('Repository access verification failed')
    expect(error.name).toBe('AppError')
    expect(error.originalError).toBeUndefined()
  })

  it('保留原始錯誤', () => {
    const originalError = new Error('socket hang up')
    const error = new AppError(ErrorType.NETWORK_ERROR, 'cannot reach GitHub: socket hang up', originalError)

    expect(error.originalError).toBe(originalError)
  })
})

describe('toError', () => {
  it('Error 原樣回傳', () => {
    const error = new TypeError('bad')

    expect(toError(error)).toBe(error)
  })

  it('其他值轉為 Error', () => {
    expect(toError('plain').message).toBe('plain')
    expect(toError(42).message).toBe('42')
  })
})

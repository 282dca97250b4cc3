import { describe, expect, it } from 'vitest'
import {
  REGISTRY_ERRORS,
  RegistryError,
  isRegistryError,
  registryError,
} from '../src/errors'
import { safeTrySync } from '../src/safe'

describe('registryError', () => {
  it('should default to the message of its code', () => {
    const error = registryError(REGISTRY_ERRORS.ALREADY_REGISTERED, {
      evmAddress: '0x01',
    })
    expect(error).toBeInstanceOf(RegistryError)
    expect(error.name).toBe('RegistryError')
    expect(error.code).toBe('already_registered')
    expect(error.message).toBe('Account already registered')
    expect(error.context).toEqual({ evmAddress: '0x01' })
  })

  it('should prefer an explicit message', () => {
    const error = registryError(
      REGISTRY_ERRORS.DEPLOYMENT_FAILED,
      undefined,
      'out of resources',
    )
    expect(error.message).toBe('out of resources')
  })
})

describe('isRegistryError', () => {
  it('should match the error class and optionally its code', () => {
    const error = registryError(REGISTRY_ERRORS.UNAUTHORIZED)
    expect(isRegistryError(error)).toBe(true)
    expect(isRegistryError(error, REGISTRY_ERRORS.UNAUTHORIZED)).toBe(true)
    expect(isRegistryError(error, REGISTRY_ERRORS.NOT_CONFIGURED)).toBe(false)
    expect(isRegistryError(new Error('plain'))).toBe(false)
    expect(isRegistryError(undefined)).toBe(false)
  })
})

describe('safeTrySync', () => {
  it('should capture thrown errors', () => {
    const [error] = safeTrySync(() => JSON.parse('{'))
    expect(error).toBeInstanceOf(SyntaxError)
  })

  it('should wrap thrown non-errors', () => {
    const [error] = safeTrySync(() => {
      throw 'boom'
    })
    expect(error?.message).toBe('boom')
  })

  it('should return the value of a successful call', () => {
    expect(safeTrySync(() => 42)).toEqual([undefined, 42])
  })
})

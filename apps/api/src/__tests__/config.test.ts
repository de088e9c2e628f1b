/**
 * @fileoverview Environment configuration tests
 */

import { describe, it, expect } from 'vitest'
import { loadConfig } from '../config.js'

describe('config.ts', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({})

    expect(config.port).toBe(6129)
    expect(config.study).toEqual({ blockSize: 2, peerAveragePlaceholder: 0.6 })
    expect(config.corsOrigins).toEqual([])
    expect(config.databaseUrl).toBeUndefined()
  })

  it('should parse block size, placeholder and origins', () => {
    const config = loadConfig({
      GAME_BLOCK_SIZE: '5',
      PEER_AVERAGE_PLACEHOLDER: '0.25',
      CORS_ALLOW_ORIGINS: 'http://localhost:5173, https://study.example.org ,',
      BETTER_AUTH_SECRET: 'test-secret',
    })

    expect(config.study).toEqual({ blockSize: 5, peerAveragePlaceholder: 0.25 })
    expect(config.corsOrigins).toEqual(['http://localhost:5173', 'https://study.example.org'])
    expect(config.auth.secret).toBe('test-secret')
  })

  it('should disable the placeholder with "none"', () => {
    expect(loadConfig({ PEER_AVERAGE_PLACEHOLDER: 'none' }).study.peerAveragePlaceholder).toBeNull()
  })

  it('should reject out-of-range values', () => {
    expect(() => loadConfig({ PEER_AVERAGE_PLACEHOLDER: '1.5' })).toThrow(/PEER_AVERAGE_PLACEHOLDER/)
    expect(() => loadConfig({ GAME_BLOCK_SIZE: '0' })).toThrow(/GAME_BLOCK_SIZE/)
  })
})

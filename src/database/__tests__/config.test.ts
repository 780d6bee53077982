import { describe, expect, it } from 'vitest'
import { getDatabaseConfig } from '../config.ts'

describe('Database configuration', () => {
  it('should use sensible defaults when env vars are not set', () => {
    expect(getDatabaseConfig({})).toEqual({
      hosts: ['localhost'],
      port: 9042,
      keyspace: 'oauth_link',
      localDataCenter: 'datacenter1',
      username: undefined,
      password: undefined,
      isSslEnabled: false,
      connectTimeoutMs: 5_000,
      connectRetries: 3,
      connectRetryDelayMs: 1_000,
    })
  })

  it('should parse env vars and trim multiple hosts', () => {
    const config = getDatabaseConfig({
      SCYLLA_HOSTS: 'host1, host2 ,host3 ',
      SCYLLA_PORT: '19042',
      SCYLLA_KEYSPACE: 'custom_keyspace',
      SCYLLA_LOCAL_DATACENTER: 'dc-east',
      SCYLLA_USERNAME: 'scylla',
      SCYLLA_PASSWORD: 'test-password',
      SCYLLA_SSL: 'true',
      SCYLLA_CONNECT_TIMEOUT_MS: '2500',
      SCYLLA_CONNECT_RETRIES: '5',
      SCYLLA_CONNECT_RETRY_DELAY_MS: '250',
    })

    expect(config.hosts).toEqual(['host1', 'host2', 'host3'])
    expect(config.port).toBe(19042)
    expect(config.keyspace).toBe('custom_keyspace')
    expect(config.localDataCenter).toBe('dc-east')
    expect(config.username).toBe('scylla')
    expect(config.password).toBe('test-password')
    expect(config.isSslEnabled).toBe(true)
    expect(config.connectTimeoutMs).toBe(2500)
    expect(config.connectRetries).toBe(5)
    expect(config.connectRetryDelayMs).toBe(250)
  })

  it('should set a pool size only when it is positive', () => {
    expect(getDatabaseConfig({ SCYLLA_POOL_SIZE: '4' }).poolSize).toBe(4)
    expect(getDatabaseConfig({ SCYLLA_POOL_SIZE: '0' })).not.toHaveProperty(
      'poolSize',
    )
  })

  it('should fall back on invalid numbers', () => {
    const config = getDatabaseConfig({
      SCYLLA_PORT: 'not-a-number',
      SCYLLA_CONNECT_TIMEOUT_MS: '',
    })

    expect(config.port).toBe(9042)
    expect(config.connectTimeoutMs).toBe(5_000)
  })
})

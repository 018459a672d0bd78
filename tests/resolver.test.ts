import { Base64 } from 'js-base64'
import { describe, expect, it } from 'vitest'
import { GenerationAborted } from '@/lib/errors'
import { resolveSources, type ResolveOptions } from '@/lib/subscription/resolver'
import { HY2_NODE, TROJAN_P1, VLESS_REALITY } from './fixtures'
import { TEST_FETCH_OPTIONS, clientWith, routes } from './http-stub'

const SLOW = 'https://slow.example.com/sub'
const FAST = 'https://fast.example.com/sub'
const BROKEN = 'https://broken.example.com/sub'

function options(concurrency: number): ResolveOptions {
  return {
    ...TEST_FETCH_OPTIONS,
    maxRetries: 1,
    concurrency,
    client: clientWith(
      routes(
        {
          [SLOW]: Base64.encode(TROJAN_P1),
          [FAST]: VLESS_REALITY,
        },
        { [SLOW]: 30 }
      )
    ),
  }
}

describe('resolveSources', () => {
  it('returns results in source order regardless of completion order', async () => {
    const resolved = await resolveSources(
      [
        { origin: SLOW, kind: 'remote' },
        { origin: FAST, kind: 'remote' },
      ],
      options(2)
    )

    expect(resolved.map(source => source.report.sourceTag)).toEqual([SLOW, FAST])
    expect(resolved.map(source => source.report.format)).toEqual(['base64', 'plain'])
    expect(resolved.flatMap(source => source.nodes.map(node => node.name))).toEqual(['t1', 'Reality Node'])
  })

  it('records a failed source and keeps the others', async () => {
    const resolved = await resolveSources(
      [
        { origin: HY2_NODE, kind: 'inline' },
        { origin: BROKEN, kind: 'remote' },
        { origin: TROJAN_P1, kind: 'inline' },
      ],
      options(4)
    )

    expect(resolved.map(source => source.report.status)).toEqual(['ok', 'failed', 'ok'])
    expect(resolved.map(source => source.report.sourceTag)).toEqual(['inline-1', BROKEN, 'inline-3'])
    expect(resolved[1]?.nodes).toEqual([])
    expect(resolved[1]?.report.error).toEqual({
      code: 'FetchError',
      message: `Failed to fetch ${BROKEN} after 1 attempt(s): HTTP 404: not found`,
    })
  })

  it('counts candidates and skipped items per source', async () => {
    const [resolved] = await resolveSources([{ origin: `${TROJAN_P1}\nfoo://bar`, kind: 'inline' }], options(1))
    expect(resolved?.report).toMatchObject({
      status: 'ok',
      format: 'plain',
      candidateCount: 2,
      decodedCount: 1,
      diagnostics: [],
    })
    expect(resolved?.report.skipped).toHaveLength(1)
  })

  it('reports unrecognized content as a diagnostic', async () => {
    const [resolved] = await resolveSources([{ origin: 'hello, world!', kind: 'inline' }], options(1))
    expect(resolved?.report.status).toBe('ok')
    expect(resolved?.report.format).toBe('unrecognized')
    expect(resolved?.report.diagnostics).toEqual(['Content format not recognized: hello, world!'])
  })

  it('handles an empty source list', async () => {
    await expect(resolveSources([], options(4))).resolves.toEqual([])
  })

  it('rejects with GenerationAborted when cancelled', async () => {
    const controller = new AbortController()
    controller.abort()
    await expect(
      resolveSources([{ origin: TROJAN_P1, kind: 'inline' }], options(1), controller.signal)
    ).rejects.toBeInstanceOf(GenerationAborted)
  })
})

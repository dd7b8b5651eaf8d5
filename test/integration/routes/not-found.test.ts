import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import { describe, expect, it } from 'vitest'
import { build } from '../../helpers/app.js'

describe('Unknown routes', () => {
  it('should answer 404 without echoing the query string', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({
      method: 'GET',
      url: '/api/missing?token=test-token',
    })

    expect(response.statusCode).toBe(404)
    expect(response.json<ErrorResponse>()).toEqual({
      statusCode: 404,
      code: 'NOT_FOUND',
      error: 'Not Found',
      message: 'Route GET /api/missing not found',
    })
  })
})

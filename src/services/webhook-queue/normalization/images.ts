import type { ArrImage } from '@root/schemas/webhooks/arr-payload.schema.js'

/**
 * Returns a publicly reachable URL for the given cover type.
 *
 * `url` on *Arr images is usually a local /MediaCover path that Discord
 * cannot fetch, so only absolute URLs are accepted from it.
 */
export function pickImageUrl(
  images: ArrImage[] | undefined,
  coverType: 'poster' | 'fanart',
): string | undefined {
  const image = images?.find((img) => img.coverType === coverType)
  if (!image) {
    return undefined
  }
  if (image.remoteUrl) {
    return image.remoteUrl
  }
  if (image.url && /^https?:\/\//i.test(image.url)) {
    return image.url
  }
  return undefined
}

/**
 * *Arr reports an unknown year as 0.
 */
export function normalizeYear(year: number | undefined): number | undefined {
  return year && year > 0 ? year : undefined
}

export function yearFromDate(date: string | undefined): number | undefined {
  if (!date) {
    return undefined
  }
  const parsed = new Date(date)
  return Number.isNaN(parsed.getTime())
    ? undefined
    : normalizeYear(parsed.getUTCFullYear())
}

import { z } from "zod"

// Collector data is best effort: a malformed optional field is dropped, not rejected.
function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined)
}

const optionalText = lenient(z.string())
const optionalCount = lenient(z.number().int().nonnegative())
const textList = z.array(z.string()).catch([])

const HttpUrlSchema = z
  .string()
  .trim()
  .min(1)
  .max(4_096)
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: "URL must use http or https" })

export const LinkStatsSchema = z.object({
  total: z.number().int().nonnegative(),
  internal: z.number().int().nonnegative(),
  external: z.number().int().nonnegative(),
})

export const StorefrontRequestSchema = z.object({
  url: HttpUrlSchema,
  html_content: z.string(),
  screenshot_base64: optionalText,
  title: optionalText,
  meta_description: optionalText,
  meta_keywords: optionalText,
  scripts: optionalCount,
  external_scripts: optionalCount,
  links: lenient(LinkStatsSchema),
  images: optionalCount,
  load_time: optionalText,
  charset: optionalText,
  language: optionalText,
  forms: optionalText,
  iframes: optionalText,
  protocol: optionalText,
})

export const MarketplaceSellerSchema = z.object({
  name: optionalText,
  profile_url: optionalText,
  join_date: optionalText,
  location: optionalText,
  rating: optionalText,
  response_rate: optionalText,
  other_listings_count: optionalCount,
  listings_count: optionalText,
  followers_count: optionalCount,
  ratings_count: optionalCount,
  ratings_average: lenient(z.number().min(0).max(5)),
  badges: textList,
  strengths: textList,
  profile_screenshot: optionalText,
  response_time: optionalText,
  verified_identity: z.boolean().catch(false),
  mutual_friends: optionalCount,
  recent_activity: optionalText,
  seller_since: optionalText,
  total_sales: optionalCount,
  profile_completeness: lenient(z.number().int().min(0).max(100)),
})

export const MarketplaceListingSchema = z.object({
  title: optionalText,
  price: optionalText,
  description: optionalText,
  condition: optionalText,
  location: optionalText,
  posted_date: optionalText,
  category: optionalText,
  image_count: optionalCount,
})

export const MarketplaceRequestSchema = z.object({
  url: HttpUrlSchema,
  screenshot_base64: optionalText,
  html_content: optionalText,
  listing: lenient(MarketplaceListingSchema),
  seller: lenient(MarketplaceSellerSchema),
  listing_images: textList,
  seller_other_listings: textList,
})

type DeepReadonly<T> = T extends readonly (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T

export type StorefrontRequest = DeepReadonly<z.infer<typeof StorefrontRequestSchema>>
export type MarketplaceRequest = DeepReadonly<z.infer<typeof MarketplaceRequestSchema>>
export type MarketplaceSeller = DeepReadonly<z.infer<typeof MarketplaceSellerSchema>>
export type MarketplaceListing = DeepReadonly<z.infer<typeof MarketplaceListingSchema>>

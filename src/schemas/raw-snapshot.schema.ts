import { z } from 'zod';
import type { RawElementNode, RawFrameContent } from '../types/raw-snapshot.js';

export const RawRectSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
});

export const RawStyleSchema = z.object({
  display: z.string().optional(),
  visibility: z.string().optional(),
  opacity: z.string().optional(),
  cursor: z.string().optional(),
});

export const RawTextNodeSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

export const RawElementNodeSchema: z.ZodType<RawElementNode> = z.lazy(() =>
  z.object({
    type: z.literal('element'),
    tagName: z.string().min(1),
    attributes: z.record(z.string()),
    xpath: z.string(),
    rect: RawRectSchema.nullable(),
    style: RawStyleSchema.optional(),
    isTopElement: z.boolean().optional(),
    children: z.array(z.union([RawElementNodeSchema, RawTextNodeSchema])),
    frame: RawFrameContentSchema.nullable().optional(),
  }),
);

export const RawFrameContentSchema: z.ZodType<RawFrameContent> = z.lazy(() =>
  z.object({
    scrollX: z.number(),
    scrollY: z.number(),
    root: RawElementNodeSchema,
  }),
);

export const ViewportInfoSchema = z.object({
  width: z.number().nonnegative(),
  height: z.number().nonnegative(),
  scrollX: z.number(),
  scrollY: z.number(),
  pageWidth: z.number().nonnegative(),
  pageHeight: z.number().nonnegative(),
});

export const TabInfoSchema = z.object({
  pageId: z.number().int(),
  url: z.string(),
  title: z.string(),
});

export const RawPageSnapshotSchema = z.object({
  url: z.string(),
  title: z.string(),
  viewport: ViewportInfoSchema,
  root: RawElementNodeSchema,
  tabs: z.array(TabInfoSchema).optional(),
  screenshot: z.string().optional(),
});

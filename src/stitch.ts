import sharp from 'sharp'
import type { ImageSize } from './types.js'

export interface StripPlacement extends ImageSize {
  left: number
}

export interface StripLayout {
  width: number
  height: number
  placements: StripPlacement[]
}

const WHITE = { r: 255, g: 255, b: 255 }

/**
 * Lays panels out left to right at the tallest panel's height. Shorter panels
 * are scaled up proportionally; panels already at that height keep their width.
 */
export function planStrip(sizes: ImageSize[], gap: number): StripLayout {
  if (sizes.length === 0) {
    throw new Error('Cannot stitch an empty list of panels')
  }

  const height = Math.max(...sizes.map((s) => s.height))
  const placements: StripPlacement[] = []
  let left = 0
  for (const size of sizes) {
    const width =
      size.height === height ? size.width : Math.floor(size.width * (height / size.height))
    placements.push({ left, width, height })
    left += width + gap
  }

  const width = placements.reduce((sum, p) => sum + p.width, 0) + gap * (sizes.length - 1)
  return { width, height, placements }
}

async function readSize(path: string): Promise<ImageSize> {
  const { width, height } = await sharp(path).metadata()
  if (!width || !height) {
    throw new Error(`Could not read image dimensions of ${path}`)
  }
  return { width, height }
}

/** Concatenates the panel images horizontally on a white canvas and writes a PNG. */
export async function stitchPanels(
  paths: string[],
  outPath: string,
  gap: number,
): Promise<StripLayout> {
  const sizes: ImageSize[] = []
  for (const path of paths) sizes.push(await readSize(path))
  const layout = planStrip(sizes, gap)

  const layers: sharp.OverlayOptions[] = []
  for (const [i, path] of paths.entries()) {
    const place = layout.placements[i]
    const original = sizes[i]
    const image = sharp(path)
    if (original.width !== place.width || original.height !== place.height) {
      image.resize({
        width: place.width,
        height: place.height,
        fit: 'fill',
        kernel: sharp.kernel.lanczos3,
      })
    }
    layers.push({ input: await image.png().toBuffer(), left: place.left, top: 0 })
  }

  await sharp({
    create: { width: layout.width, height: layout.height, channels: 3, background: WHITE },
  })
    .composite(layers)
    .png()
    .toFile(outPath)

  console.log(`  ✓ Stitched ${paths.length} panels → ${outPath}`)
  return layout
}

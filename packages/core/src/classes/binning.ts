import { ckmeans } from 'simple-statistics';
import type { FontModel, MetricName } from '@layoutforge/types';
import { ResolutionError } from '../errors/LayoutError.js';

/**
 * Split glyphs into `binCount` bins by 1-D optimal k-means over a metric.
 *
 * Bins are ordered by ascending metric value and keep the input order
 * inside each bin. When there are fewer distinct values than bins, the
 * trailing bins are empty.
 */
export function binGlyphsByMetric(
  font: FontModel,
  glyphs: readonly string[],
  metric: MetricName,
  binCount: number
): string[][] {
  const bins: string[][] = Array.from({ length: binCount }, () => []);
  if (glyphs.length === 0 || binCount < 1) {
    return bins;
  }

  const values = glyphs.map((glyph) => {
    const metrics = font.metrics(glyph);
    if (!metrics) {
      throw new ResolutionError(`Cannot bin glyph '${glyph}': it is not in the font`, 'ERR_MISSING_GLYPH', { glyph, metric });
    }
    return metrics[metric];
  });

  const distinct = new Set(values).size;
  const clusters = ckmeans(values, Math.min(binCount, distinct));
  const bounds = clusters.map(cluster => [cluster[0], cluster[cluster.length - 1]]);

  glyphs.forEach((glyph, i) => {
    const value = values[i];
    const index = bounds.findIndex(([low, high]) => value >= low && value <= high);
    bins[index].push(glyph);
  });
  return bins;
}

/**
 * Mean metric value of each non-empty bin.
 */
export function binAverages(font: FontModel, bins: readonly (readonly string[])[], metric: MetricName): number[] {
  return bins
    .filter(bin => bin.length > 0)
    .map(bin => bin.reduce((sum, glyph) => sum + (font.metrics(glyph)?.[metric] ?? 0), 0) / bin.length);
}

export type PixelBox = {
  xmin: number;
  ymin: number;
  xmax: number;
  ymax: number;
};

export type ImageSize = {
  width: number;
  height: number;
};

export type NormalizedBox = {
  /** starts from 0 */
  class_idx: number;
  /** center, normalized to [0,1] */
  x: number;
  y: number;
  /** extent, normalized to (0,1] */
  width: number;
  height: number;
};

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

function isBetweenZeroAndOne(value: number): boolean {
  return value >= 0 && value <= 1;
}

/**
 * Clamp a pixel box into the image frame, then convert it into normalized
 * center/extent form.
 *
 * Boxes partly outside the frame keep their visible part. Boxes that collapse
 * to zero area after clamping (including boxes entirely outside the frame)
 * are rejected with `null`.
 */
export function normalizeBox(
  class_idx: number,
  box: PixelBox,
  size: ImageSize
): NormalizedBox | null {
  const { width: image_width, height: image_height } = size;

  const xmin = clamp(box.xmin, 0, image_width);
  const ymin = clamp(box.ymin, 0, image_height);
  const xmax = clamp(box.xmax, 0, image_width);
  const ymax = clamp(box.ymax, 0, image_height);

  const x = (xmin + xmax) / 2 / image_width;
  const y = (ymin + ymax) / 2 / image_height;
  const width = (xmax - xmin) / image_width;
  const height = (ymax - ymin) / image_height;

  if (width <= 0 || height <= 0 || x < 0 || y < 0) return null;

  return { class_idx, x, y, width, height };
}

export function denormalizeBox(box: NormalizedBox, size: ImageSize): PixelBox {
  const half_width = (box.width * size.width) / 2;
  const half_height = (box.height * size.height) / 2;
  const center_x = box.x * size.width;
  const center_y = box.y * size.height;
  return {
    xmin: center_x - half_width,
    ymin: center_y - half_height,
    xmax: center_x + half_width,
    ymax: center_y + half_height,
  };
}

/**
 * Fixed six decimals. Exact half-way values round half to even, e.g.
 * `0.1953125` -> `"0.195312"`, so the output only depends on the input value.
 */
export function formatCoordinate(value: number): string {
  const [integer_part, fraction] = value.toFixed(30).split(".");
  const kept = fraction.slice(0, 6);
  const is_tie = fraction[6] === "5" && /^0*$/.test(fraction.slice(7));
  if (is_tie && +kept[5] % 2 === 0) {
    return `${integer_part}.${kept}`;
  }
  return value.toFixed(6);
}

function validateClassIndex(options: {
  class_idx: number;
  n_class: number;
}): void {
  const { class_idx, n_class } = options;
  if (!Number.isInteger(class_idx) || class_idx < 0 || class_idx >= n_class) {
    throw new Error(
      `Invalid class index: receive ${class_idx} but expect a range of [0,${
        n_class - 1
      }]`
    );
  }
}

function validateBoundingBox(box: {
  x: number;
  y: number;
  width: number;
  height: number;
}): void {
  const { x, y, width, height } = box;
  if (!isBetweenZeroAndOne(x) || !isBetweenZeroAndOne(y)) {
    throw new Error(
      `Invalid bounding box coordinates: x=${x}, y=${y}. Expected range [0, 1].`
    );
  }

  if (!isBetweenZeroAndOne(width) || !isBetweenZeroAndOne(height)) {
    throw new Error(
      `Invalid bounding box size: width=${width}, height=${height}. Expected range [0, 1].`
    );
  }
}

export type DetectLabelStringOptions = NormalizedBox & {
  n_class: number;
};

/** e.g. `"2 0.195312 0.195312 0.195312 0.195312"`, without line break */
export function toDetectLabelString(options: DetectLabelStringOptions): string {
  const { class_idx, x, y, width, height } = options;
  validateClassIndex(options);
  validateBoundingBox(options);
  return [class_idx, ...[x, y, width, height].map(formatCoordinate)].join(" ");
}

/** one newline-terminated line per box, empty string for no box */
export function toDetectLabelFileContent(
  boxes: NormalizedBox[],
  n_class: number
): string {
  return boxes
    .map((box) => toDetectLabelString({ ...box, n_class }) + "\n")
    .join("");
}

export function parseDetectLabelString(options: {
  line: string;
  n_class?: number;
}): NormalizedBox {
  const { line, n_class } = options;
  const label_parts = line.trim().split(/\s+/);

  if (label_parts.length !== 5) {
    throw new Error(
      `Invalid detect (bounding box) label line: expected 5 parts but got ${label_parts.length} parts`
    );
  }

  const [class_idx, x, y, width, height] = label_parts.map(Number);
  validateClassIndex({ class_idx, n_class: n_class ?? Infinity });
  validateBoundingBox({ x, y, width, height });

  return { class_idx, x, y, width, height };
}

export type FrameFormat = "jpeg" | "png";

export interface Frame {
  data: Buffer;
  format: FrameFormat;
  capturedAt: string;
  source?: string;
}

const JPEG_SIGNATURE = Buffer.from([0xff, 0xd8, 0xff]);
const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

function startsWith(data: Buffer, signature: Buffer): boolean {
  return data.length >= signature.length && data.subarray(0, signature.length).equals(signature);
}

export function detectFrameFormat(data: Buffer): FrameFormat | undefined {
  if (startsWith(data, JPEG_SIGNATURE)) {
    return "jpeg";
  }
  if (startsWith(data, PNG_SIGNATURE)) {
    return "png";
  }
  return undefined;
}

export function isValidFrame(frame: Frame | null | undefined): frame is Frame {
  if (!frame || !Buffer.isBuffer(frame.data) || frame.data.length === 0) {
    return false;
  }
  return detectFrameFormat(frame.data) === frame.format;
}

export function frameExtension(format: FrameFormat): "jpg" | "png" {
  return format === "jpeg" ? "jpg" : "png";
}

export function createFrame(data: Buffer, source?: string, capturedAt = new Date()): Frame | undefined {
  const format = detectFrameFormat(data);
  if (!format) {
    return undefined;
  }
  return {
    data,
    format,
    capturedAt: capturedAt.toISOString(),
    source
  };
}

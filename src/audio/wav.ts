export function extractPcm16FromWav(wavData: Buffer): Buffer {
  if (wavData.length < 44) {
    return Buffer.alloc(0);
  }
  const riff = wavData.toString("ascii", 0, 4);
  if (riff !== "RIFF") {
    return Buffer.alloc(0);
  }
  let offset = 12;
  while (offset + 8 <= wavData.length) {
    const chunkId = wavData.toString("ascii", offset, offset + 4);
    const chunkSize = wavData.readUInt32LE(offset + 4);
    if (chunkId === "data") {
      // Recorders streaming to a file leave the size unset until they exit.
      return wavData.subarray(offset + 8, Math.min(offset + 8 + chunkSize, wavData.length));
    }
    offset += 8 + chunkSize;
    if (chunkSize % 2 !== 0) {
      offset++;
    }
  }
  return Buffer.alloc(0);
}

export function getRecentSamples(pcm: Buffer, byteCount: number): Buffer {
  if (pcm.length <= byteCount) {
    return pcm;
  }
  return pcm.subarray(pcm.length - byteCount);
}

export function rmsAmplitude(pcm16: Buffer): number {
  const sampleCount = Math.floor(pcm16.length / 2);
  if (sampleCount === 0) {
    return 0;
  }
  let sumSquares = 0;
  for (let i = 0; i < sampleCount; i++) {
    const sample = pcm16.readInt16LE(i * 2);
    sumSquares += sample * sample;
  }
  return Math.sqrt(sumSquares / sampleCount);
}

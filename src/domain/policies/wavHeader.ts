/**
 * Policy: 44-байтный заголовок RIFF/WAVE для PCM s16le.
 */
export function wavHeader(params: { sampleRate: number; channels: number; dataBytes: number }): Buffer {
  const channels = Math.max(1, Math.floor(params.channels));
  const sampleRate = Math.max(1, Math.floor(params.sampleRate));
  const bitsPerSample = 16;
  const blockAlign = (channels * bitsPerSample) / 8;
  const byteRate = sampleRate * blockAlign;
  const dataBytes = Math.max(0, Math.floor(params.dataBytes));

  const h = Buffer.alloc(44);
  h.write("RIFF", 0, "ascii");
  h.writeUInt32LE(36 + dataBytes, 4);
  h.write("WAVE", 8, "ascii");
  h.write("fmt ", 12, "ascii");
  h.writeUInt32LE(16, 16);
  h.writeUInt16LE(1, 20); // PCM
  h.writeUInt16LE(channels, 22);
  h.writeUInt32LE(sampleRate, 24);
  h.writeUInt32LE(byteRate, 28);
  h.writeUInt16LE(blockAlign, 32);
  h.writeUInt16LE(bitsPerSample, 34);
  h.write("data", 36, "ascii");
  h.writeUInt32LE(dataBytes, 40);
  return h;
}

#!/usr/bin/env npx tsx

/**
 * Demo script: hash an image under several configurations and compare it
 * with its own mirror image.
 *
 * Usage: npm run demo -- <image>
 */

import sharp from 'sharp';
import {
  ImageHasher,
  compareHashes,
  type HashConfigInput,
} from '../src/index.js';

async function main() {
  const imagePath = process.argv[2];
  if (!imagePath) {
    console.error('❌ Please pass an image path');
    console.error('Usage: npm run demo -- <image>');
    process.exit(1);
  }

  console.log('🎨 Perceptual Hash Demo\n');

  const original = ImageHasher.fromSource(imagePath);
  const mirrored = ImageHasher.fromSource(
    await sharp(imagePath).flop().png().toBuffer()
  );

  // 1. One image, several configurations; the image is decoded once
  console.log('📊 Hashes by configuration:\n');
  const configs: HashConfigInput[] = [
    { geometry: '8x8', method: 'average' },
    { geometry: '8x8', method: 'median' },
    { geometry: '7x7', reduce: true, method: 'average_x' },
    { geometry: 35, method: 'log' },
    { geometry: 35, method: 'diff' },
  ];
  for (const config of configs) {
    const result = await original.hash(config);
    console.log(`  ${JSON.stringify(config)}`);
    console.log(`    ${result.hex} (${result.bitLength} bits)`);
  }
  console.log();

  // 2. Mirror handling
  console.log('🪞 Mirror handling:\n');
  const plainA = await original.hash();
  const plainB = await mirrored.hash();
  const plain = compareHashes(plainA.hex, plainB.hex, plainA.bitLength);
  console.log(`  Plain hash distance to mirror:       ${plain.distance}`);

  const viaMirror = await original.hash({ mirror: true });
  const mirrorFlag = compareHashes(viaMirror.hex, plainB.hex, viaMirror.bitLength);
  console.log(`  mirror=true vs flopped image:        ${mirrorFlag.distance}`);

  const proofA = await original.hash({ mirrorproof: true });
  const proofB = await mirrored.hash({ mirrorproof: true });
  const proof = compareHashes(proofA.hex, proofB.hex, proofA.bitLength);
  console.log(`  mirrorproof distance to mirror:      ${proof.distance}\n`);

  console.log('💡 Hashes are only comparable when produced by the same provider and settings.');
  console.log('✨ Demo complete!');
}

main().catch(console.error);

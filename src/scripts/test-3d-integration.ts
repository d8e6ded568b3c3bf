/**
 * Manual integration check for the 3D generation endpoints.
 * Requires a running server and detector; posts the first image in ./images.
 *
 *   npm run build && npm run integration -- path/to/plan.png
 */

import fs from 'fs';
import path from 'path';
import axios from 'axios';
import { appConfig } from '../config/app.config';
import { DEFAULT_GENERATION_CONFIG, FILE_UPLOAD } from '../utils/constants';
import { getErrorMessage } from '../utils/errors';
import { ElementClass } from '../types/floor-plan.types';
import { Generate3DResponse } from '../types/api.types';

const API_URL = process.env.API_URL || `http://127.0.0.1:${appConfig.port}`;
const IMAGE_FOLDER = './images';
const OUTPUT_PATH = 'test_output.gltf';
const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg'];

const MIME_BY_EXTENSION: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg'
};

const countLabels = (detection: unknown): Record<string, number> => {
  const counts: Record<string, number> = {};
  if (typeof detection !== 'object' || detection === null || !('classes' in detection)) return counts;
  if (!Array.isArray(detection.classes)) return counts;

  for (const entry of detection.classes) {
    const name = typeof entry === 'object' && entry !== null && 'name' in entry && typeof entry.name === 'string'
      ? entry.name
      : '<missing>';
    counts[name] = (counts[name] ?? 0) + 1;
  }
  return counts;
};

const buildForm = (imagePath: string): FormData => {
  const extension = path.extname(imagePath).toLowerCase();
  const image = fs.readFileSync(imagePath);
  const form = new FormData();
  form.append(
    FILE_UPLOAD.FIELD_NAME,
    new Blob([new Uint8Array(image)], { type: MIME_BY_EXTENSION[extension] ?? 'application/octet-stream' }),
    path.basename(imagePath)
  );
  for (const [key, value] of Object.entries(DEFAULT_GENERATION_CONFIG)) {
    form.append(key, String(value));
  }
  return form;
};

async function testDetectionOnly(imagePath: string): Promise<boolean> {
  console.log('\n🔍 Testing detector directly...');
  try {
    const response = await axios.post<unknown>(appConfig.detector.url, buildForm(imagePath));
    const counts = countLabels(response.data);
    const total = Object.values(counts).reduce((sum, n) => sum + n, 0);
    console.log(`✅ Detection successful: ${total} elements`);
    return true;
  } catch (error) {
    console.error('❌ Detection failed:', getErrorMessage(error));
    return false;
  }
}

async function test3DGeneration(imagePath: string, outputPath: string = OUTPUT_PATH): Promise<boolean> {
  console.log('\n🏗️  Testing 3D generation API...');
  console.log(`   Input image: ${imagePath}`);

  try {
    const response = await axios.post<Generate3DResponse>(`${API_URL}/api/generate3d`, buildForm(imagePath));
    const { detection, metadata, diagnostics, gltf } = response.data;
    const counts = countLabels(detection);

    console.log('✅ API response successful');
    console.log('\nDetection results:');
    console.log(`   • Walls: ${counts[ElementClass.WALL] ?? 0}`);
    console.log(`   • Doors: ${counts[ElementClass.DOOR] ?? 0}`);
    console.log(`   • Windows: ${counts[ElementClass.WINDOW] ?? 0}`);
    if (Object.keys(diagnostics.droppedLabels).length > 0) {
      console.log(`   • Dropped: ${JSON.stringify(diagnostics.droppedLabels)}`);
    }

    console.log('\n3D model metadata:');
    console.log(`   - Wall height: ${metadata.wall_height}m`);
    console.log(`   - Wall thickness: ${metadata.wall_thickness}m`);
    console.log(`   - Vertices: ${metadata.num_vertices}`);
    console.log(`   - Faces: ${metadata.num_faces}`);

    fs.writeFileSync(outputPath, JSON.stringify(gltf, null, 2));
    console.log(`\n💾 glTF model saved to: ${outputPath}`);
    return true;
  } catch (error) {
    if (axios.isAxiosError(error) && error.response) {
      console.error(`❌ API error: status ${error.response.status}`, error.response.data);
    } else {
      console.error(`❌ Could not reach ${API_URL}: ${getErrorMessage(error)}`);
    }
    return false;
  }
}

const findImage = (): string | undefined => {
  const explicit = process.argv[2];
  if (explicit) return explicit;
  if (!fs.existsSync(IMAGE_FOLDER)) return undefined;

  const image = fs.readdirSync(IMAGE_FOLDER)
    .find(file => IMAGE_EXTENSIONS.includes(path.extname(file).toLowerCase()));
  return image ? path.join(IMAGE_FOLDER, image) : undefined;
};

async function main(): Promise<void> {
  console.log('='.repeat(60));
  console.log('Floor plan to 3D - integration check');
  console.log('='.repeat(60));

  const imagePath = findImage();
  if (!imagePath || !fs.existsSync(imagePath)) {
    console.log(`\n⚠️  No floor plan image found. Add one to ${IMAGE_FOLDER}/ or pass a path.`);
    process.exitCode = 1;
    return;
  }

  const detected = await testDetectionOnly(imagePath);
  const generated = await test3DGeneration(imagePath);
  process.exitCode = detected && generated ? 0 : 1;
}

main().catch((error: unknown) => {
  console.error('❌ Integration check crashed:', getErrorMessage(error));
  process.exitCode = 1;
});

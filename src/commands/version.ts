import { PRODUCT_NAME } from '../constants/index.js';
import { getVersion } from '../utils/package.js';

export async function setupVersionCommand(): Promise<void> {
  console.log(`${PRODUCT_NAME} CLI v${getVersion()}`);
  console.log(`Node.js ${process.version} (${process.platform}/${process.arch})`);
}

import { main } from './driver.js';
import { SAMPLE_PACKAGES } from './domain/sample-packages.js';

main(SAMPLE_PACKAGES, (line) => console.log(line));

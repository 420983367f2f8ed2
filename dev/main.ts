import { Harness, VERSION } from "../src/index";

console.log(`mapgen-primitives v${VERSION}`);

const canvas = document.getElementById("canvas");
if (!(canvas instanceof HTMLCanvasElement)) {
  throw new Error("Missing #canvas element");
}

// Escape stops the loop and releases GPU resources
const harness = new Harness({ canvas });
harness.start();

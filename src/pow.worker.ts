import { parentPort, workerData } from "worker_threads";
import type { PowWorkerData } from "./types.js";
import { mineSingleThreaded } from "./pow.js";

const data: PowWorkerData = workerData;

parentPort?.postMessage(mineSingleThreaded(data.evt, data.bits, data.offset, data.stride));

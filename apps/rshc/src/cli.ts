#!/usr/bin/env -S tsx
import { exec } from "./exec.js";

await exec();

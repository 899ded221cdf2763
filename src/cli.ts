#!/usr/bin/env node
// src/cli.ts
import { main } from "./index.js";

void main();

#!/usr/bin/env node

import { main } from "./cli/index";

void main();

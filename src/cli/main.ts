#!/usr/bin/env node
import { runCli } from "./program";

runCli();

#!/usr/bin/env node
import 'dotenv/config'
import { exitOnFailure, main } from './cli'

void exitOnFailure(main(process.argv, process.env))

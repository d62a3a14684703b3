/**
 * Action entry point
 */
import { run } from './main'

void run()

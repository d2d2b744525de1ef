import { run } from '@/main';

// Initialize and run the action
void run();

// src/main.ts

import { AppController } from './core/AppController';
import { loadConfig }    from './core/config';

document.addEventListener('DOMContentLoaded', () => {
    const controller = new AppController(loadConfig());
    controller.start();
});

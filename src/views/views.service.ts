import { Injectable } from '@nestjs/common';
import * as handlebars from 'handlebars';
import * as fs from 'fs';
import * as path from 'path';
import { CustomLoggerService } from '../common/services/logger.service';
import {
  availabilityLabel,
  formatMoney,
  seatPreferenceLabel,
  statusLabel,
} from './view-helpers';

export type ViewName = 'index' | 'results' | 'booking' | 'payment' | 'ticket' | 'error';

export const VIEWS_DIR = path.join(__dirname, '..', '..', 'views');

/**
 * Compiles every page under `views/` once at startup. Partials live in
 * `views/partials` and are registered under their file name, so pages wrap
 * themselves with `{{#> layout title="..."}}`.
 */
@Injectable()
export class ViewsService {
  private readonly engine = handlebars.create();
  private readonly templateCache = new Map<string, handlebars.TemplateDelegate>();
  private readonly logger = new CustomLoggerService();

  constructor() {
    this.logger.setContext('ViewsService');
    this.registerHelpers();
    this.preloadTemplates(VIEWS_DIR);
  }

  render(view: ViewName, context: object): string {
    const template = this.templateCache.get(view);

    if (!template) {
      throw new Error(`View not found: ${view}`);
    }

    return template(context);
  }

  private registerHelpers(): void {
    this.engine.registerHelper('money', (cents: unknown) =>
      typeof cents === 'number' ? formatMoney(cents) : '',
    );
    this.engine.registerHelper('eq', (left: unknown, right: unknown) => left === right);
    this.engine.registerHelper('inc', (value: unknown) => Number(value) + 1);
    this.engine.registerHelper('availabilityLabel', availabilityLabel);
    this.engine.registerHelper('statusLabel', statusLabel);
    this.engine.registerHelper('seatPreferenceLabel', seatPreferenceLabel);
  }

  private preloadTemplates(viewsDir: string): void {
    if (!fs.existsSync(viewsDir)) {
      throw new Error(`Views directory not found: ${viewsDir}`);
    }

    const partialsDir = path.join(viewsDir, 'partials');
    if (fs.existsSync(partialsDir)) {
      for (const file of fs.readdirSync(partialsDir)) {
        if (file.endsWith('.hbs')) {
          const content = fs.readFileSync(path.join(partialsDir, file), 'utf-8');
          this.engine.registerPartial(file.replace('.hbs', ''), content);
        }
      }
    }

    for (const file of fs.readdirSync(viewsDir)) {
      if (file.endsWith('.hbs')) {
        const content = fs.readFileSync(path.join(viewsDir, file), 'utf-8');
        this.templateCache.set(file.replace('.hbs', ''), this.engine.compile(content));
      }
    }

    this.logger.debug(`Loaded ${this.templateCache.size} views`);
  }
}

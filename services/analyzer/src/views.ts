import path from 'node:path';

import { Liquid } from 'liquidjs';

export const VIEWS_DIR = path.join(__dirname, '..', 'views');

export type ViewName = 'index' | 'select';

export interface ViewRenderer {
  render(view: ViewName, data: Record<string, unknown>): Promise<string>;
}

export const createViewRenderer = (root: string = VIEWS_DIR): ViewRenderer => {
  const engine = new Liquid({
    root,
    extname: '.liquid',
    outputEscape: 'escape',
    cache: true
  });

  return {
    render: async (view, data) => {
      const html: unknown = await engine.renderFile(view, data);
      return String(html);
    }
  };
};

import { describe, expect, it } from 'vitest';
import { ConfigurationError } from 'app/errors';
import { loadDefaultLayout, loadLevelLayout, parseLevelLayout } from 'util/levels';

describe('level layouts', () => {
    it('parses a layout and keeps optional hit-points', () => {
        const layout = parseLevelLayout({
            name: 'pair',
            bricks: [
                { id: 'a', type: 'normal', position: { x: 0, y: 3 }, halfSize: { width: 1, height: 0.3 } },
                { id: 'b', type: 'reinforced', position: { x: 2, y: 3 }, halfSize: { width: 1, height: 0.3 }, hitPoints: 3 },
            ],
        });

        expect(layout.name).toBe('pair');
        expect(layout.bricks).toEqual([
            { id: 'a', type: 'normal', position: { x: 0, y: 3 }, halfSize: { width: 1, height: 0.3 } },
            { id: 'b', type: 'reinforced', position: { x: 2, y: 3 }, halfSize: { width: 1, height: 0.3 }, hitPoints: 3 },
        ]);
    });

    it('names a layout without a name after the fallback', () => {
        expect(parseLevelLayout({ bricks: [] }, 'inline').name).toBe('inline');
    });

    it('rejects a value that is not a layout', () => {
        expect(() => parseLevelLayout([])).toThrow(ConfigurationError);
    });

    it('reports every malformed brick', () => {
        try {
            parseLevelLayout({ bricks: [{ id: 1, type: 'glass', position: { x: 0, y: 0 }, halfSize: { width: 1, height: 1 } }, 'x'] });
            expect.fail('expected a ConfigurationError');
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigurationError);
            if (error instanceof ConfigurationError) {
                expect(error.issues).toEqual([
                    'bricks[0].id must be a string',
                    'bricks[0].type must be one of normal, reinforced, indestructible, power-up',
                    'bricks[1] must be an object',
                ]);
            }
        }
    });

    it('loads the bundled default grid', async () => {
        const layout = await loadDefaultLayout();
        expect(layout.name).toBe('default');
        expect(layout.bricks).toHaveLength(40);
        expect(new Set(layout.bricks.map((brick) => brick.id)).size).toBe(40);
        expect(layout.bricks.filter((brick) => brick.type === 'indestructible')).toHaveLength(2);
    });

    it('reports a missing layout file as a configuration error', async () => {
        await expect(loadLevelLayout('/nonexistent/levels/missing.json')).rejects.toBeInstanceOf(ConfigurationError);
    });
});

import { FontProvider, FontRegistry } from '../../../../src/infrastructure/rendering/FontProvider';

const FONT_KEY = { key: 'registered-face' };

describe('FontProvider', () => {
    let registry: jest.Mocked<FontRegistry>;
    let warnSpy: jest.SpyInstance;

    beforeEach(() => {
        registry = {
            registerFromPath: jest.fn().mockReturnValue(FONT_KEY),
            has: jest.fn().mockReturnValue(false),
        };
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(() => {
        warnSpy.mockRestore();
    });

    test('should register an existing font file under the requested family', () => {
        const provider = new FontProvider({
            candidates: [{ path: '/fonts/missing.ttf' }, { path: '/fonts/a.ttf' }],
            skipDefaults: true,
            registry,
            fileExists: (p) => p === '/fonts/a.ttf',
        });

        const font = provider.resolve('DejaVu Sans', 40, true);

        expect(font).toEqual({
            family: 'DejaVu Sans',
            size: 40,
            bold: true,
            source: 'registered',
            css: '700 40px "DejaVu Sans", sans-serif',
        });
        expect(registry.registerFromPath).toHaveBeenCalledTimes(1);
        expect(registry.registerFromPath).toHaveBeenCalledWith('/fonts/a.ttf', 'DejaVu Sans');
    });

    test('should fall back to the built-in family and warn once', () => {
        const provider = new FontProvider({ skipDefaults: true, registry, fileExists: () => false });

        const first = provider.resolve('DejaVu Sans', 32);
        const second = provider.resolve('DejaVu Sans', 60, true);

        expect(first).toEqual({
            family: 'sans-serif',
            size: 32,
            bold: false,
            source: 'builtin',
            css: '400 32px sans-serif',
        });
        expect(second.css).toBe('700 60px sans-serif');
        expect(warnSpy).toHaveBeenCalledTimes(1);
        expect(warnSpy).toHaveBeenCalledWith('[Fonts] No font file found for "DejaVu Sans", using sans-serif');
    });

    test('should use a family the system already provides', () => {
        registry.has.mockReturnValue(true);
        const provider = new FontProvider({ skipDefaults: true, registry, fileExists: () => false });

        expect(provider.resolve('Arial', 28).source).toBe('registered');
        expect(warnSpy).not.toHaveBeenCalled();
    });

    test('should not throw when the registry fails', () => {
        registry.registerFromPath.mockImplementation(() => {
            throw new Error('corrupt font');
        });
        const provider = new FontProvider({
            candidates: [{ path: '/fonts/broken.ttf' }],
            skipDefaults: true,
            registry,
            fileExists: () => true,
        });

        expect(provider.resolve('Broken', 20).source).toBe('builtin');
        expect(warnSpy).toHaveBeenCalledTimes(2);
    });

    test('should register only the first candidate that loads', () => {
        const provider = new FontProvider({
            candidates: [{ path: '/fonts/configured.ttf' }, { path: '/fonts/other.ttf' }],
            skipDefaults: true,
            registry,
            fileExists: () => true,
        });

        expect(provider.resolve('DejaVu Sans', 40).source).toBe('registered');
        expect(registry.registerFromPath.mock.calls).toEqual([['/fonts/configured.ttf', 'DejaVu Sans']]);
    });

    test('should move on when a candidate file cannot be loaded', () => {
        registry.registerFromPath.mockReturnValueOnce(null);
        const provider = new FontProvider({
            candidates: [{ path: '/fonts/corrupt.ttf' }, { path: '/fonts/other.ttf' }],
            skipDefaults: true,
            registry,
            fileExists: () => true,
        });

        expect(provider.resolve('DejaVu Sans', 40).family).toBe('DejaVu Sans');
        expect(registry.registerFromPath.mock.calls).toEqual([
            ['/fonts/corrupt.ttf', 'DejaVu Sans'],
            ['/fonts/other.ttf', 'DejaVu Sans'],
        ]);
        expect(warnSpy).toHaveBeenCalledWith('[Fonts] Could not load /fonts/corrupt.ttf');
    });

    test('should register the bold face of the chosen candidate', () => {
        const provider = new FontProvider({
            candidates: [
                { path: '/fonts/Sans.ttf', boldPath: '/fonts/Sans-Bold.ttf' },
                { path: '/fonts/Other.ttf', boldPath: '/fonts/Other-Bold.ttf' },
            ],
            skipDefaults: true,
            registry,
            fileExists: () => true,
        });

        provider.resolve('Sans', 40, true);

        expect(registry.registerFromPath.mock.calls).toEqual([
            ['/fonts/Sans.ttf', 'Sans'],
            ['/fonts/Sans-Bold.ttf', 'Sans'],
        ]);
    });

    test('should load each family only once', () => {
        const provider = new FontProvider({
            candidates: [{ path: '/fonts/a.ttf' }],
            skipDefaults: true,
            registry,
            fileExists: () => true,
        });

        provider.resolve('DejaVu Sans', 40);
        provider.resolve('DejaVu Sans', 50);

        expect(registry.registerFromPath).toHaveBeenCalledTimes(1);
    });

    test('should try the common install locations after configured paths', () => {
        const seen: string[] = [];
        const provider = new FontProvider({
            candidates: [{ path: '/custom/font.ttf' }],
            registry,
            fileExists: (p) => {
                seen.push(p);
                return false;
            },
        });

        provider.resolve('DejaVu Sans', 40);

        expect(seen[0]).toBe('/custom/font.ttf');
        expect(seen).toContain('/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf');
    });
});

import { createSegment, getTotalDuration } from '../../../../src/domain/entities/Segment';

describe('Segment', () => {
    const valid = {
        index: 0,
        videoPath: '/tmp/run/slide_00.mp4',
        imagePath: '/tmp/run/slide_00.png',
        audioPath: '/tmp/run/slide_00.mp3',
        silent: false,
        durationSeconds: 4.5,
    };

    describe('createSegment', () => {
        test('should create a frozen segment', () => {
            const segment = createSegment(valid);

            expect(segment).toEqual(valid);
            expect(Object.isFrozen(segment)).toBe(true);
        });

        test('should reject a negative index', () => {
            expect(() => createSegment({ ...valid, index: -1 })).toThrow('Segment index must be non-negative');
        });

        test('should reject an empty video path', () => {
            expect(() => createSegment({ ...valid, videoPath: ' ' })).toThrow('Segment videoPath cannot be empty');
        });

        test.each([0, -2, Number.NaN, Number.POSITIVE_INFINITY])('should reject duration %p', (durationSeconds) => {
            expect(() => createSegment({ ...valid, durationSeconds })).toThrow(
                'Segment durationSeconds must be a positive number'
            );
        });
    });

    test('getTotalDuration should sum segment durations', () => {
        const segments = [
            createSegment(valid),
            createSegment({ ...valid, index: 1, durationSeconds: 3 }),
        ];
        expect(getTotalDuration(segments)).toBe(7.5);
        expect(getTotalDuration([])).toBe(0);
    });
});

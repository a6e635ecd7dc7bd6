import { describe, it, expect } from 'vitest';
import { MessageHandler, Severity, NO_ERROR, formatMessage } from './message-handler.ts';

describe('MessageHandler', () => {
    it('should keep messages in emission order', () => {
        const handler = new MessageHandler();
        handler.addMessage(Severity.Warning, 'main', 3, 'first');
        handler.addMessage(Severity.Info, 'main', 1, 'second');

        expect(handler.getMessages().map(m => m.message)).toEqual(['first', 'second']);
        expect(handler.warnings()).toHaveLength(1);
    });

    it('should report NO_ERROR when there are only warnings', () => {
        const handler = new MessageHandler();
        handler.addMessage(Severity.Warning, 'main', 2, 'unused');

        expect(handler.getError()).toBe(NO_ERROR);
        expect(handler.hasError()).toBe(false);
    });

    it('should return the first error', () => {
        const handler = new MessageHandler();
        handler.addMessage(Severity.Warning, 'main', 1, 'w');
        handler.addMessage(Severity.Error, 'main', 4, 'bad');
        handler.addMessage(Severity.InternalError, 'main', 5, 'worse');

        expect(handler.getError().message).toBe('bad');
        expect(handler.getError().line).toBe(4);
    });

    it('should treat internal errors as errors', () => {
        const handler = new MessageHandler();
        handler.addMessage(Severity.InternalError, 'lib', 7, 'broken');
        expect(handler.hasError()).toBe(true);
    });

    it('should return snapshots', () => {
        const handler = new MessageHandler();
        const before = handler.getMessages();
        handler.addMessage(Severity.Info, 'main', 1, 'later');
        expect(before).toHaveLength(0);

        handler.clear();
        expect(handler.getMessages()).toHaveLength(0);
    });
});

describe('formatMessage', () => {
    it('should render section, line and severity', () => {
        expect(formatMessage({ severity: Severity.Error, section: 'main', line: 12, message: 'oops' }))
            .toBe('main(12): error: oops');
        expect(formatMessage({ severity: Severity.Warning, section: 'hdr', line: 1, message: 'hm' }))
            .toBe('hdr(1): warning: hm');
    });
});

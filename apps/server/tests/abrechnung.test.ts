import { describe, it, expect } from 'vitest';
import {
    Abrechnung,
    POSITION_COUNT,
    formatIsoDate,
    parseIsoDate,
} from '../src/services/aktive/abrechnung';

function sample() {
    const a = new Abrechnung();
    a.positions[0].value = 50;
    a.positions[1].unitprice = -4;
    a.positions[1].unitcount = 3;
    a.donations = 10;
    return a;
}

describe('Abrechnung', () => {
    it('holds exactly seven empty positions', () => {
        const a = new Abrechnung();
        expect(POSITION_COUNT).toBe(7);
        expect(a.positions).toHaveLength(7);
        expect(a.positions.every((p) => p.isEmpty())).toBe(true);
        expect(a.isEmpty()).toBe(true);
        expect(a.income).toBe(0);
        expect(a.cost).toBe(0);
        expect(a.total).toBe(0);
    });

    describe('isEmpty', () => {
        it('is false once any position has a name', () => {
            const a = new Abrechnung();
            a.positions[3].name = 'Flyer';
            expect(a.isEmpty()).toBe(false);
        });

        it('is false with donations only', () => {
            const a = new Abrechnung();
            a.donations = 5;
            expect(a.isEmpty()).toBe(false);
        });
    });

    describe('totals', () => {
        it('adds donations to income', () => {
            const a = sample();
            expect(a.income).toBe(60);
            expect(a.cost).toBe(12);
        });

        // Spenden zählen zu den Einnahmen, aber nicht zum Ergebnis
        it('excludes donations from total, so income minus cost differs from it', () => {
            const a = sample();
            expect(a.total).toBe(38);
            expect(a.income - a.cost).toBe(48);
            expect(a.toString()).toBe('38,00 €');
        });

        it('lists the sum lines with signed amounts', () => {
            expect(sample().sums()).toEqual([
                ['Spenden', '+ 10,00 €'],
                ['Einnahmen gesamt', '+ 60,00 €'],
                ['Ausgaben gesamt', '+ 12,00 €'],
                ['Ergebnis', '+ 38,00 €'],
            ]);
        });
    });

    describe('donations', () => {
        it('clamps negative amounts to zero', () => {
            const a = new Abrechnung();
            expect(a.setDonations(-3)).toBe(false);
            expect(a.donations).toBe(0);
            expect(a.setDonations(12.5)).toBe(true);
            expect(a.donations).toBe(12.5);
        });
    });

    describe('iban', () => {
        it('groups a valid iban after the country prefix', () => {
            const a = new Abrechnung();
            expect(a.setIban('12345678901234567890')).toBe(true);
            expect(a.iban).toBe('12 3456 7890 1234 5678 90');
            expect(a.getIban(false)).toBe('12345678901234567890');
            expect(a.ibanValid).toBe(true);
        });

        it('strips spaces before validating', () => {
            const a = new Abrechnung();
            expect(a.setIban('12 3456 7890 1234 5678 90')).toBe(true);
            expect(a.getIban(false)).toBe('12345678901234567890');
        });

        it('rejects letters and wrong lengths', () => {
            const a = new Abrechnung();
            for (const bad of ['DE12345678901234567890', '1234', '1234567890123456789a', '123456789012345678901']) {
                a.setIban('12345678901234567890');
                expect(a.setIban(bad)).toBe(false);
                expect(a.iban).toBe('');
                expect(a.ibanValid).toBe(false);
            }
        });

        it('accepts clearing the iban', () => {
            const a = new Abrechnung();
            expect(a.setIban('')).toBe(true);
            expect(a.iban).toBe('');
        });
    });

    describe('projectdate', () => {
        it('parses year-month-day strings', () => {
            const a = new Abrechnung();
            expect(a.setProjectdate('2024-05-01')).toBe(true);
            expect(a.projectdate?.getUTCFullYear()).toBe(2024);
            expect(a.projectdate?.getUTCMonth()).toBe(4);
            expect(a.projectdate?.getUTCDate()).toBe(1);
            expect(formatIsoDate(a.projectdate)).toBe('2024-05-01');
        });

        it('clears the date on invalid input', () => {
            const a = new Abrechnung();
            for (const bad of ['not-a-date', '2024-13-99', '2023-02-29', '2024-05']) {
                a.projectdate = '2024-05-01';
                expect(a.setProjectdate(bad)).toBe(false);
                expect(a.projectdate).toBeNull();
            }
        });

        it('knows leap days', () => {
            expect(formatIsoDate(parseIsoDate('2024-02-29'))).toBe('2024-02-29');
        });

        it('takes date values directly', () => {
            const a = new Abrechnung();
            a.projectdate = new Date(Date.UTC(2023, 11, 24));
            expect(formatIsoDate(a.projectdate)).toBe('2023-12-24');
            a.projectdate = new Date('garbage');
            expect(a.projectdate).toBeNull();
        });
    });

    describe('payment modes', () => {
        it('accepts iban modes 1 to 3', () => {
            const a = new Abrechnung();
            expect(a.setIbanmode(2)).toBe(true);
            expect(a.ibanmode).toBe(2);
            expect(a.setIbanmode('3')).toBe(true);
            expect(a.ibanmode).toBe(3);
        });

        it('clears invalid iban modes', () => {
            const a = new Abrechnung();
            a.ibanmode = 1;
            expect(a.setIbanmode(4)).toBe(false);
            expect(a.ibanmode).toBeNull();
            a.ibanmode = 1;
            expect(a.setIbanmode('x')).toBe(false);
            expect(a.ibanmode).toBeNull();
            a.ibanmode = 1;
            a.ibanmode = 0;
            expect(a.ibanmode).toBeNull();
        });

        it('accepts only sepa modes 2 and 3', () => {
            const a = new Abrechnung();
            expect(a.setSepamode(1)).toBe(false);
            expect(a.sepamode).toBeNull();
            expect(a.setSepamode(2)).toBe(true);
            expect(a.sepamode).toBe(2);
        });

        it('stores ibanknown as a flag', () => {
            const a = new Abrechnung();
            expect(a.ibanknown).toBe(false);
            a.ibanknown = true;
            expect(a.ibanknown).toBe(true);
        });

        it('lists the checkboxes in form order', () => {
            const a = new Abrechnung();
            a.ibanmode = 3;
            a.ibanknown = true;
            a.sepamode = 2;
            expect(a.paymentOptions().map(([, checked]) => checked)).toEqual([
                false, false, true, true, true, false,
            ]);
            expect(a.paymentOptions()[3][0]).toBe('Die IBAN liegt bereits vor');
        });
    });

    describe('suggestFilename', () => {
        it('uses project, date and user', () => {
            const a = new Abrechnung();
            a.projectname = 'Sommerfest';
            a.projectdate = '2024-05-01';
            a.username = 'Kim Muster';
            expect(a.suggestFilename()).toBe('Aktivenabrechnung_sommerfest_2024-05-01_kim-muster');
        });

        it('skips missing parts', () => {
            expect(new Abrechnung().suggestFilename()).toBe('Aktivenabrechnung');
        });
    });
});

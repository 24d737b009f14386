import { detectProvider } from '../src/validators/providers';

describe('detectProvider', () => {
  it('should recognise providers from the SMTP banner', () => {
    expect(detectProvider('220 mx.google.com ESMTP ready', 'mx.example.com')).toBe('gmail');
    expect(detectProvider('220 mta.yahoodns.net ESMTP', 'mx.example.com')).toBe('yahoo');
  });

  it('should fall back to the MX hostname', () => {
    expect(detectProvider('', 'example-com.mail.protection.outlook.com')).toBe('outlook');
    expect(detectProvider('220 ready', 'mx.zoho.eu')).toBe('zoho');
  });

  it('should prefer the banner over the hostname', () => {
    expect(detectProvider('220 Microsoft ESMTP MAIL Service', 'aspmx.l.google.com')).toBe('outlook');
  });

  it('should report generic when nothing matches', () => {
    expect(detectProvider('', 'mx.example.net')).toBe('generic');
  });
});

import { HttpStatus } from '@nestjs/common';
import { mock, MockProxy } from 'jest-mock-extended';
import { MailDeliveryException } from '@app/mailer/error/MailDeliveryException';
import { MailerService } from '@app/mailer/MailerService';
import { OutgoingEmail } from '@app/mailer/model/OutgoingEmail';
import { SESClientService } from '@app/mailer/ses/SESClientService';
import { SESDeliveryResult } from '@app/mailer/ses/SESDeliveryResult';

describe('MailerService', () => {
  const email = OutgoingEmail.copyingSender({
    from: 'me@sender.example.com',
    to: 'sales@robo-one.example.com',
    subject: 'Hello',
    html: '<p>Hi</p>',
  });

  let sesClientService: MockProxy<SESClientService>;
  let service: MailerService;

  beforeEach(() => {
    sesClientService = mock<SESClientService>();
    service = new MailerService(sesClientService);
  });

  it('발송 결과를 영수증으로 반환한다', async () => {
    // given
    sesClientService.send.mockResolvedValue(
      new SESDeliveryResult({
        MessageId: 'msg-1',
        $metadata: { httpStatusCode: 200 },
      }),
    );

    // when
    const receipt = await service.send(email);

    // then
    expect(receipt).toEqual({
      messageId: 'msg-1',
      from: 'me@sender.example.com',
      to: 'sales@robo-one.example.com',
      cc: ['me@sender.example.com'],
      attachmentsCount: 0,
      sentAt: expect.any(Date),
    });
    expect(sesClientService.send).toHaveBeenCalledWith(email.commandInput);
    expect(sesClientService.sendRaw).not.toHaveBeenCalled();
  });

  it('첨부 파일이 있으면 MIME 원문으로 보내고 개수를 반환한다', async () => {
    // given
    const withAttachments = OutgoingEmail.copyingSender({
      from: 'me@sender.example.com',
      to: 'sales@robo-one.example.com',
      subject: 'Leads',
      html: '<p>Attached</p>',
      attachments: [
        {
          filename: 'leads.csv',
          content: Buffer.from('a,b\r\n', 'utf8'),
          contentType: 'text/csv',
        },
        {
          filename: 'deck.pdf',
          content: Buffer.from('%PDF-1.4 test', 'utf8'),
          contentType: 'application/pdf',
        },
      ],
    });
    sesClientService.sendRaw.mockResolvedValue(
      new SESDeliveryResult({
        MessageId: 'msg-2',
        $metadata: { httpStatusCode: 200 },
      }),
    );

    // when
    const receipt = await service.send(withAttachments);

    // then
    expect(receipt.messageId).toBe('msg-2');
    expect(receipt.attachmentsCount).toBe(2);
    expect(sesClientService.send).not.toHaveBeenCalled();

    const [input] = sesClientService.sendRaw.mock.calls[0];
    const raw = Buffer.from(input.RawMessage?.Data ?? []).toString('utf8');
    expect(input.Destinations).toEqual([
      'sales@robo-one.example.com',
      'me@sender.example.com',
    ]);
    expect(raw).toContain('\r\nContent-Type: text/csv; name="leads.csv"\r\n');
    expect(raw).toContain(
      '\r\nContent-Type: application/pdf; name="deck.pdf"\r\n',
    );
    expect(raw).toContain('\r\nJVBERi0xLjQgdGVzdA==\r\n');
  });

  it('발송에 실패하면 MailDeliveryException을 던진다', async () => {
    // given
    sesClientService.send.mockRejectedValue(new Error('throttled'));

    // when
    const promise = service.send(email);

    // then
    await expect(promise).rejects.toBeInstanceOf(MailDeliveryException);
    await expect(promise).rejects.toMatchObject({
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      responseMessage: 'Email sending failed: throttled',
    });
  });
});

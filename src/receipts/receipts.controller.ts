import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Delete,
  Get,
  Headers,
  HttpException,
  HttpStatus,
  Inject,
  InternalServerErrorException,
  Param,
  Post,
  Put,
  Res,
  UnprocessableEntityException,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { FileInterceptor } from '@nestjs/platform-express';
import {
  ApiBody,
  ApiConsumes,
  ApiHeader,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { processingConfig } from '../config/configuration';
import {
  DuplicateReceiptResponseDto,
  ReceiptResponseDto,
  UpdateReceiptDto,
  UploadReceiptResponseDto,
} from './dto/receipt.dto';
import { ReceiptIngestionError } from './errors/receipt-processing.errors';
import { Receipt } from './interfaces/receipt.interface';
import { ReceiptsService } from './receipts.service';

export const ALLOWED_CONTENT_TYPES = ['image/jpeg', 'image/jpg', 'image/png', 'image/tiff'];
export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

/** Non-standard status used when the client went away mid-request. */
export const CLIENT_CLOSED_REQUEST = 499;

/** The part of the response the upload handler watches for a dropped client. */
export interface ResponseLifecycle {
  readonly writableFinished: boolean;
  once(event: 'close', listener: () => void): unknown;
  off(event: 'close', listener: () => void): unknown;
}

export function receiptImageFilter(
  _req: unknown,
  file: { mimetype: string },
  callback: (error: Error | null, acceptFile: boolean) => void,
): void {
  if (file.mimetype === 'application/pdf') {
    callback(new BadRequestException('PDF receipts are not supported. Please upload a photo of the receipt.'), false);
  } else if (ALLOWED_CONTENT_TYPES.includes(file.mimetype)) {
    callback(null, true);
  } else {
    callback(new BadRequestException('File type not accepted. Only JPEG, PNG and TIFF images are allowed.'), false);
  }
}

export function toHttpException(error: ReceiptIngestionError): HttpException {
  switch (error.kind) {
    case 'duplicate':
      return new ConflictException({
        statusCode: HttpStatus.CONFLICT,
        message: error.message,
        existingReceiptId: error.existingReceiptId,
      });
    case 'invalid_receipt':
    case 'poor_image_quality':
    case 'missing_required_fields':
      return new UnprocessableEntityException(error.message);
    case 'ocr_failed':
      return new HttpException(error.message, HttpStatus.BAD_GATEWAY);
    case 'cancelled':
      return new HttpException(error.message, CLIENT_CLOSED_REQUEST);
    case 'unexpected':
      return new InternalServerErrorException(error.message);
  }
}

@ApiTags('receipts')
@ApiHeader({ name: 'x-user-id', required: false, description: 'Owner of the receipts' })
@Controller('receipts')
export class ReceiptsController {
  constructor(
    private readonly receiptsService: ReceiptsService,
    @Inject(processingConfig.KEY) private readonly config: ConfigType<typeof processingConfig>,
  ) {}

  @Post('upload')
  @ApiOperation({ summary: 'Upload a receipt image and extract its data' })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        receipt: {
          type: 'string',
          format: 'binary',
          description: 'Receipt image file (JPEG, PNG or TIFF)',
        },
      },
    },
  })
  @ApiResponse({ status: HttpStatus.CREATED, type: UploadReceiptResponseDto })
  @ApiResponse({ status: HttpStatus.BAD_REQUEST, description: 'Missing, empty or unsupported file' })
  @ApiResponse({ status: HttpStatus.CONFLICT, type: DuplicateReceiptResponseDto })
  @ApiResponse({ status: HttpStatus.UNPROCESSABLE_ENTITY, description: 'Image is not a usable receipt' })
  @ApiResponse({ status: HttpStatus.BAD_GATEWAY, description: 'OCR service failed' })
  @UseInterceptors(
    FileInterceptor('receipt', {
      fileFilter: receiptImageFilter,
      limits: {
        fileSize: MAX_UPLOAD_BYTES,
      },
    }),
  )
  async upload(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Headers('x-user-id') userIdHeader: string | undefined,
    @Res({ passthrough: true }) res: ResponseLifecycle,
  ): Promise<UploadReceiptResponseDto> {
    if (!file) {
      throw new BadRequestException('No receipt image provided');
    }
    if (file.size === 0 || file.buffer.length === 0) {
      throw new BadRequestException('Uploaded receipt image is empty');
    }

    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    };
    res.once('close', onClose);

    try {
      const receipt = await this.receiptsService.processReceipt(
        {
          userId: this.resolveUserId(userIdHeader),
          content: file.buffer,
          contentType: file.mimetype,
          filename: file.originalname,
        },
        controller.signal,
      );
      return {
        message: 'Receipt processed successfully',
        receipt: await this.toResponse(receipt),
      };
    } catch (error) {
      if (error instanceof ReceiptIngestionError) {
        throw toHttpException(error);
      }
      throw error;
    } finally {
      res.off('close', onClose);
    }
  }

  @Get()
  @ApiOperation({ summary: 'Get all receipts of the user' })
  @ApiResponse({ status: HttpStatus.OK, type: [ReceiptResponseDto] })
  async findAll(@Headers('x-user-id') userIdHeader: string | undefined): Promise<ReceiptResponseDto[]> {
    const receipts = await this.receiptsService.findAll(this.resolveUserId(userIdHeader));
    return Promise.all(receipts.map(receipt => this.toResponse(receipt)));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a receipt by ID' })
  @ApiParam({ name: 'id', description: 'Receipt ID' })
  @ApiResponse({ status: HttpStatus.OK, type: ReceiptResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Receipt not found' })
  async findOne(
    @Param('id') id: string,
    @Headers('x-user-id') userIdHeader: string | undefined,
  ): Promise<ReceiptResponseDto> {
    return this.toResponse(await this.receiptsService.findOne(id, this.resolveUserId(userIdHeader)));
  }

  @Put(':id')
  @ApiOperation({ summary: 'Correct the extracted data of a receipt' })
  @ApiParam({ name: 'id', description: 'Receipt ID' })
  @ApiBody({ type: UpdateReceiptDto })
  @ApiResponse({ status: HttpStatus.OK, type: ReceiptResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Receipt not found' })
  @ApiResponse({ status: HttpStatus.BAD_REQUEST, description: 'Invalid receipt data provided' })
  async update(
    @Param('id') id: string,
    @Headers('x-user-id') userIdHeader: string | undefined,
    @Body() changes: UpdateReceiptDto,
  ): Promise<ReceiptResponseDto> {
    return this.toResponse(await this.receiptsService.update(id, this.resolveUserId(userIdHeader), changes));
  }

  @Delete(':id')
  @ApiOperation({ summary: 'Delete a receipt and its stored files' })
  @ApiParam({ name: 'id', description: 'Receipt ID' })
  @ApiResponse({ status: HttpStatus.OK, type: ReceiptResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Receipt not found' })
  async remove(
    @Param('id') id: string,
    @Headers('x-user-id') userIdHeader: string | undefined,
  ): Promise<Receipt> {
    return this.receiptsService.remove(id, this.resolveUserId(userIdHeader));
  }

  private resolveUserId(header: string | undefined): string {
    const userId = header?.trim();
    return userId ? userId : this.config.defaultUserId;
  }

  private async toResponse(receipt: Receipt): Promise<ReceiptResponseDto> {
    return { ...receipt, imageUrl: await this.receiptsService.getImageUrl(receipt) };
  }
}

import { Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import {
  ApiBody,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { ToolDispatchService } from './tool-dispatch.service';
import { TOOL_NAMES, ToolDescription, ToolResult } from './types/tool-result.types';

@ApiTags('tools')
@Controller('api/tools')
export class ToolsController {
  constructor(private readonly dispatcher: ToolDispatchService) {}

  @Get()
  @ApiOperation({ summary: 'List the available tools' })
  list(): ToolDescription[] {
    return this.dispatcher.listTools();
  }

  @Post(':name')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Invoke a tool',
    description: `
      The body holds the tool's arguments (snake_case).

      Failures are reported in the body, never through the status code:
      \`{ "status": "error", "error_type": "...", "message": "..." }\`
    `,
  })
  @ApiParam({ name: 'name', enum: TOOL_NAMES })
  @ApiBody({ schema: { type: 'object' }, required: false })
  @ApiResponse({ status: 200, description: 'Tool result or error envelope' })
  invoke(
    @Param('name') name: string,
    @Body() args: Record<string, unknown>,
  ): Promise<ToolResult> {
    return this.dispatcher.dispatch(name, args);
  }
}

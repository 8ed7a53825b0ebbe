import {All, Controller, DynamicModule, Inject, Module, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import type {Dispatcher} from '../http/dispatcher'
import {GATEWAY_API_DISPATCHER} from './tokens'

export type GatewayApiNestModuleOptions = {
  dispatcher: Dispatcher
}

// Every path and method reaches the dispatcher; routing happens in the route table.
@Controller()
class GatewayApiController {
  public constructor(
    @Inject(GATEWAY_API_DISPATCHER)
    private readonly dispatcher: Dispatcher
  ) {}

  @All('*')
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.dispatcher.dispatch(request, response)
  }
}

@Module({
  controllers: [GatewayApiController]
})
export class GatewayApiNestModule {
  public static register(options: GatewayApiNestModuleOptions): DynamicModule {
    return {
      module: GatewayApiNestModule,
      providers: [
        {
          provide: GATEWAY_API_DISPATCHER,
          useValue: options.dispatcher
        }
      ]
    }
  }
}

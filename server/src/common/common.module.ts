import { Global, Module } from "@nestjs/common";
import { CLOCK, systemClock } from "./clock";
import { ServerSentEventsService } from "./server-sent-events.service";

@Global()
@Module({
	providers: [
		{ provide: CLOCK, useValue: systemClock },
		ServerSentEventsService,
	],
	exports: [CLOCK, ServerSentEventsService],
})
export class CommonModule {}
